/**
 * Error Handler Middleware
 */

import { Request, Response, NextFunction } from 'express'
import { logger } from '../utils/logger'

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

// Shape of the errors body-parser raises (http-errors)
interface HttpError extends Error {
  status: number
  expose?: boolean
  type?: string
}

function isHttpError(error: Error): error is HttpError {
  return 'status' in error && typeof error.status === 'number'
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (error instanceof ApiError) {
    logger.warn('Request rejected', {
      status: error.statusCode,
      code: error.code,
      path: req.path,
      method: req.method
    })

    return res.status(error.statusCode).json({
      error: error.message,
      code: error.code
    })
  }

  if (isHttpError(error) && error.status >= 400 && error.status < 500) {
    logger.warn('Malformed request', {
      status: error.status,
      type: error.type,
      path: req.path,
      method: req.method
    })

    return res.status(error.status).json({
      error: error.expose ? error.message : 'Bad request',
      code: error.type
    })
  }

  logger.error('Error handling request', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  })

  // Default to 500 for unexpected errors
  res.status(500).json({
    error: 'Internal server error'
  })
}
