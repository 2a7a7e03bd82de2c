/**
 * Metrics App Configuration (without server startup)
 *
 * Exported for supertest and for main.ts, which owns listen().
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express'
import type { Server } from 'node:http'
import type { Registry } from 'prom-client'
import { loggers } from './config/logger.js'

const log = loggers.server

export interface PollStatus {
  cycles: number
  lastCycleAt: Date | null
}

export function createMetricsApp(registry: Registry, status: () => PollStatus): Express {
  const app: Express = express()
  app.disable('x-powered-by')

  app.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await registry.metrics()
      res.set('Content-Type', registry.contentType)
      res.send(body)
    } catch (error) {
      next(error)
    }
  })

  app.get('/health', (_req: Request, res: Response) => {
    const { cycles, lastCycleAt } = status()
    res.json({
      status: 'ok',
      cycles,
      lastCycleAt: lastCycleAt ? lastCycleAt.toISOString() : null,
    })
  })

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    log.error('Metrics request failed', { message: err.message }, err)
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}

export function startMetricsServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port)
    server.once('listening', () => {
      log.info('Metrics endpoint listening', { port })
      resolve(server)
    })
    server.once('error', reject)
  })
}

export function stopMetricsServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()))
  })
}
