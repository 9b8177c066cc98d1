import type { Request, RequestHandler } from 'express'
import { upstashCmd, type UpstashConfig } from './upstash.js'

/**
 * Per-IP fixed-window rate limiting.
 *
 * Counters live in process memory by default. When Upstash Redis is configured
 * (production), `INCR` + `EXPIRE` is used instead so several instances share a window.
 * Keys hold the IP and the window number only; they expire with the window.
 */

export type LimitCfg = { limit: number; windowSeconds: number }

export const LIMITS = {
  SEARCH_READS: { limit: 120, windowSeconds: 60 },
} satisfies Record<string, LimitCfg>

export type LimitKey = keyof typeof LIMITS

export interface RateLimitStore {
  /** Returns the hit count in the window after this hit, or null when the store is unavailable. */
  incr(key: string, windowSeconds: number, nowS: number): Promise<number | null>
}

export function memoryStore(): RateLimitStore {
  const hits = new Map<string, { count: number; expiresAt: number }>()
  let lastSweep = 0

  return {
    async incr(key, windowSeconds, nowS) {
      if (nowS !== lastSweep) {
        for (const [k, v] of hits) {
          if (v.expiresAt <= nowS) hits.delete(k)
        }
        lastSweep = nowS
      }
      const prev = hits.get(key)
      const count = (prev?.count || 0) + 1
      hits.set(key, { count, expiresAt: prev?.expiresAt ?? nowS + windowSeconds })
      return count
    },
  }
}

export function upstashStore(conn: UpstashConfig): RateLimitStore {
  return {
    async incr(key, windowSeconds) {
      const incr = await upstashCmd<number>(conn, ['INCR', key]).catch(() => null)
      const count = Number(incr?.result || 0) || 0
      if (!count) return null
      if (count === 1) {
        await upstashCmd(conn, ['EXPIRE', key, windowSeconds]).catch(() => null)
      }
      return count
    },
  }
}

export function getIp(req: Request) {
  const xff = String(req.get('x-forwarded-for') || '').split(',')[0]?.trim()
  const real = String(req.get('x-real-ip') || '').trim()
  const cf = String(req.get('cf-connecting-ip') || '').trim()
  return xff || real || cf || req.ip || 'unknown'
}

function nowSeconds() {
  return Math.floor(Date.now() / 1000)
}

function windowKey(nowS: number, windowSeconds: number) {
  return Math.floor(nowS / windowSeconds)
}

export type RateLimitDecision = { allowed: boolean; headers: Record<string, string> }

export async function enforceRateLimitByKey(
  store: RateLimitStore,
  limitKey: string,
  cfg: LimitCfg,
  key: string,
  nowS: number = nowSeconds()
): Promise<RateLimitDecision> {
  const w = windowKey(nowS, cfg.windowSeconds)
  const resetS = (w + 1) * cfg.windowSeconds
  const storeKey = `ca:rl:${limitKey}:${key}:${w}`

  // Store unavailable: fail open (availability > perfect limiting).
  const count = await store.incr(storeKey, resetS - nowS, nowS)
  if (count == null) {
    return {
      allowed: true,
      headers: {
        'X-RateLimit-Limit': String(cfg.limit),
        'X-RateLimit-Remaining': String(cfg.limit),
        'X-RateLimit-Reset': String(resetS),
      },
    }
  }

  const remaining = Math.max(0, cfg.limit - count)
  const allowed = count <= cfg.limit || cfg.limit <= 0

  return {
    allowed,
    headers: {
      'X-RateLimit-Limit': String(cfg.limit),
      'X-RateLimit-Remaining': String(remaining),
      'X-RateLimit-Reset': String(resetS),
    },
  }
}

export function rateLimit(store: RateLimitStore, limitKey: LimitKey, override?: Partial<LimitCfg>): RequestHandler {
  const cfg: LimitCfg = { ...LIMITS[limitKey], ...override }
  return (req, res, next) => {
    enforceRateLimitByKey(store, limitKey, cfg, getIp(req))
      .then((rl) => {
        res.set(rl.headers)
        if (!rl.allowed) {
          res.status(429).json({ ok: false, error: 'Too many requests' })
          return
        }
        next()
      })
      .catch(next)
  }
}
