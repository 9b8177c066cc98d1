import { promises as fs } from 'node:fs'
import type { Express, Request, Response } from 'express'
import { openApiDocument } from '../openapi.js'

export const SERVICE_NAME = 'cendoj-action'

export function metaRoutes(app: Express, opts: { privacyPolicyPath: string; publicBaseUrl: string | null }) {
  app.get('/health', (_req: Request, res: Response) => res.json({ ok: true, service: SERVICE_NAME, ts: new Date().toISOString() }))
  app.get('/healthz', (_req: Request, res: Response) => res.json({ ok: true, service: SERVICE_NAME, ts: new Date().toISOString() }))

  app.get('/openapi.json', (_req: Request, res: Response) => res.json(openApiDocument(opts.publicBaseUrl)))

  app.get('/privacy', async (_req: Request, res: Response) => {
    const text = await fs.readFile(opts.privacyPolicyPath, 'utf8').catch(() => null)
    if (text == null) return res.status(404).json({ ok: false, error: 'Privacy policy not found' })
    return res.type('text/markdown; charset=utf-8').send(text)
  })
}
