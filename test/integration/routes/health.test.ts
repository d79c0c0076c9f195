import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

describe('GET /health', () => {
  it('should report a reachable store and a healthy connection', async (t) => {
    const { app } = await build(t)

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toMatchObject({
      status: 'healthy',
      checks: { database: 'ok', connection: 'healthy', reader: 'idle' },
    })
  })

  it('should return 503 when the store is unreachable', async (t) => {
    const { app } = await build(t)
    app.store.ping = async () => {
      throw new Error('database is locked')
    }

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(503)
    expect(response.json()).toMatchObject({
      status: 'unhealthy',
      checks: { database: 'failed' },
    })
  })
})
