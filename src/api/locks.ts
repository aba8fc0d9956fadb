/**
 * Lock API
 *
 * Acquire, release and purge named locks
 */

import { Router } from 'express'
import { z } from 'zod'
import type { LockService } from '../services/lock-service'
import { LockNotFoundError } from '../storage'
import { ApiError } from '../middleware/error-handler'

const AcquireBodySchema = z.object({
  token: z.string()
})

export function createLockRouter(lockService: LockService) {
  // Routers do not inherit the app's routing settings
  const router = Router({ caseSensitive: true, strict: true })

  // POST /lock/:key - Acquire (or overwrite) a lock
  router.post('/lock/:key', async (req, res) => {
    const { key } = req.params

    if (!req.is('application/json')) {
      throw new ApiError(415, 'Expected an application/json body', 'UNSUPPORTED_MEDIA_TYPE')
    }

    const parsed = AcquireBodySchema.safeParse(req.body)
    if (!parsed.success) {
      throw new ApiError(422, 'token must be a string', 'INVALID_LOCK_BODY')
    }

    await lockService.acquire(key, parsed.data.token)

    res.status(201).end()
  })

  // POST /unlock/:key - Release a lock and return its token
  router.post('/unlock/:key', async (req, res) => {
    const { key } = req.params

    try {
      const record = await lockService.release(key)
      res.status(200).json({ token: record.token })
    } catch (error) {
      if (error instanceof LockNotFoundError) {
        throw new ApiError(410, error.message, error.code)
      }
      throw error
    }
  })

  // POST /purge - Drop every lock
  router.post('/purge', async (req, res) => {
    await lockService.purgeAll()

    res.status(200).end()
  })

  return router
}
