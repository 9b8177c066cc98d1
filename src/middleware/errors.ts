import type { ErrorRequestHandler, RequestHandler } from 'express'

export function notFound(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({ ok: false, error: 'Not found' })
  }
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err)
    // Malformed JSON bodies and similar client errors surface from express with a status.
    const status = typeof err === 'object' && err !== null && 'status' in err ? Number(err.status) : 500
    if (status >= 400 && status < 500) {
      res.status(status).json({ ok: false, error: 'Bad request' })
      return
    }
    console.error('[HTTP] unhandled error', {
      method: req.method,
      path: req.path,
      error: err instanceof Error ? err.message : String(err),
    })
    res.status(500).json({ ok: false, error: 'Internal error' })
  }
}
