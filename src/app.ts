import express, { type Express } from 'express'
import cors from 'cors'
import { memoryStore, rateLimit, upstashStore, type RateLimitStore } from '../lib/server-rate-limit.js'
import { upstashConfig } from '../lib/upstash.js'
import type { LinkChecker } from '../core/search.js'
import type { AppConfig } from './config.js'
import { createHeadChecker } from './links/headCheck.js'
import { accessLog, type AccessLogEntry } from './middleware/accessLog.js'
import { errorHandler, notFound } from './middleware/errors.js'
import { requireHttps } from './middleware/https.js'
import { metaRoutes } from './routes/meta.js'
import { noStore, searchRoutes } from './routes/search.js'

export type AppDeps = {
  checkLink?: LinkChecker
  now?: () => Date
  rateLimitStore?: RateLimitStore
  writeAccessLog?: (entry: AccessLogEntry) => void
}

function pickRateLimitStore(cfg: AppConfig): RateLimitStore {
  const conn = upstashConfig(cfg.upstashUrl, cfg.upstashToken)
  if (cfg.nodeEnv === 'production' && conn) return upstashStore(conn)
  return memoryStore()
}

export function createApp(cfg: AppConfig, deps: AppDeps = {}): Express {
  const app = express()
  app.disable('x-powered-by')

  if (cfg.accessLog) app.use(accessLog(deps.writeAccessLog))
  if (cfg.requireHttps) app.use(requireHttps())

  app.use(cors({ origin: true }))
  app.use(express.json({ limit: '1mb' }))

  const store = deps.rateLimitStore ?? pickRateLimitStore(cfg)
  app.use('/buscar-cendoj', noStore(), rateLimit(store, 'SEARCH_READS', { limit: cfg.searchRateLimit }))

  metaRoutes(app, { privacyPolicyPath: cfg.privacyPolicyPath, publicBaseUrl: cfg.publicBaseUrl })
  searchRoutes(app, {
    checkLink: deps.checkLink ?? createHeadChecker({ timeoutMs: cfg.linkCheckTimeoutMs }),
    now: deps.now,
  })

  app.use(notFound())
  app.use(errorHandler())
  return app
}
