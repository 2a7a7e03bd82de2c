/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/poller/.env.local in development only; production hosts inject
 * variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', '.env.local')
  config({ path: envPath })
}
