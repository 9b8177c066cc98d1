import type { RequestHandler } from 'express'

export type AccessLogEntry = { method: string; path: string; status: number; ms: number }

/**
 * One line per request. Only the path is logged: the query string carries the
 * user's query, which is never written anywhere. No IP or user agent either.
 */
export function accessLog(write: (entry: AccessLogEntry) => void = defaultWrite): RequestHandler {
  return (req, res, next) => {
    const started = process.hrtime.bigint()
    res.on('finish', () => {
      const ms = Number(process.hrtime.bigint() - started) / 1e6
      // originalUrl: mounted middleware rewrites req.url while it runs.
      const path = req.originalUrl.split('?')[0] || '/'
      write({ method: req.method, path, status: res.statusCode, ms: Math.round(ms * 10) / 10 })
    })
    next()
  }
}

function defaultWrite(entry: AccessLogEntry) {
  console.log('[ACCESS]', entry)
}
