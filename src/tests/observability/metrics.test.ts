import { describe, it, expect } from 'vitest'
import request from 'supertest'
import { startMetricsServer, lockOperationsTotal } from '../../observability/metrics'

describe('startMetricsServer', () => {
  it('should serve Prometheus text on /metrics and 404 elsewhere', async () => {
    lockOperationsTotal.inc({ operation: 'acquire', outcome: 'ok' })
    const server = await startMetricsServer(0, '127.0.0.1')

    try {
      const metrics = await request(server).get('/metrics').expect(200)
      expect(metrics.text).toContain('lock_registry_operations_total{operation="acquire",outcome="ok"} 1')
      expect(metrics.text).toContain('lock_registry_locks_held')

      await request(server).get('/other').expect(404)
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()))
    }
  })
})
