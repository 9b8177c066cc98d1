import type { Express, NextFunction, Request, RequestHandler, Response } from 'express'
import { z } from 'zod'
import { SORT_ORDERS } from '../../core/ranking.js'
import { searchCases, type LinkChecker } from '../../core/search.js'

const boolParam = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes' || v === 'on')

export const searchQuerySchema = z.object({
  // Validated trimmed, echoed back as received.
  query: z.string().refine((v) => v.trim().length > 0, { message: 'query must not be blank' }),
  organo: z.string().trim().optional(),
  desde: z.string().optional(),
  hasta: z.string().optional(),
  orden: z.enum(SORT_ORDERS).default('relevancia_desc'),
  limite: z.coerce.number().int().min(1).max(50).default(10),
  validar_enlaces: boolParam.default('false'),
})

export type SearchRouteDeps = {
  checkLink: LinkChecker
  now?: () => Date
}

/** Mounted ahead of the rate limiter so 429s carry it too. */
export function noStore(): RequestHandler {
  return (_req, res, next) => {
    res.set('Cache-Control', 'no-store')
    next()
  }
}

export function searchRoutes(app: Express, deps: SearchRouteDeps) {
  app.get('/buscar-cendoj', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = searchQuerySchema.safeParse(req.query)
    if (!parsed.success) {
      return res.status(422).json({ ok: false, error: 'Invalid query parameters', details: parsed.error.errors })
    }

    const p = parsed.data
    try {
      const payload = await searchCases(
        {
          query: p.query,
          organ: p.organo || null,
          from: p.desde ?? null,
          to: p.hasta ?? null,
          order: p.orden,
          limit: p.limite,
          validateLinks: p.validar_enlaces,
        },
        { checkLink: deps.checkLink, now: deps.now?.() }
      )
      return res.json({ ok: true, ...payload })
    } catch (e: unknown) {
      return next(e)
    }
  })
}
