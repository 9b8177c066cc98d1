import type { RequestHandler } from 'express'

const EXEMPT = new Set(['/health', '/healthz'])

export function isHttpsRequest(secure: boolean, forwardedProto: string | undefined) {
  if (secure) return true
  const first = String(forwardedProto || '').split(',')[0]?.trim().toLowerCase()
  return first === 'https'
}

/** Rejects plain-HTTP traffic. Health probes from the load balancer are let through. */
export function requireHttps(): RequestHandler {
  return (req, res, next) => {
    // Non-strict routing serves /healthz/ as /healthz.
    const p = req.path.length > 1 ? req.path.replace(/\/+$/, '') : req.path
    if (EXEMPT.has(p) || isHttpsRequest(req.secure, req.get('x-forwarded-proto'))) return next()
    res.status(403).json({ ok: false, error: 'HTTPS required' })
  }
}
