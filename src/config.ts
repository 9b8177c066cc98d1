import path from 'node:path'
import { z } from 'zod'
import { getRuntimeEnvVar, type EnvLookup } from '../lib/runtime-env.js'

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on')

const schema = z.object({
  nodeEnv: z.string().default('development'),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  requireHttps: flag.optional(),
  publicBaseUrl: z.string().url().nullable(),
  linkCheckTimeoutMs: z.coerce.number().int().positive().default(5000),
  accessLog: flag.default('1'),
  privacyPolicyPath: z.string().min(1),
  searchRateLimit: z.coerce.number().int().min(0).default(120),
  upstashUrl: z.string().url().nullable(),
  upstashToken: z.string().nullable(),
})

export type AppConfig = {
  nodeEnv: string
  port: number
  requireHttps: boolean
  publicBaseUrl: string | null
  linkCheckTimeoutMs: number
  accessLog: boolean
  privacyPolicyPath: string
  searchRateLimit: number
  upstashUrl: string | null
  upstashToken: string | null
}

export function loadConfig(env: EnvLookup = getRuntimeEnvVar): AppConfig {
  const parsed = schema.safeParse({
    nodeEnv: env('NODE_ENV') ?? undefined,
    port: env('PORT') ?? undefined,
    requireHttps: env('REQUIRE_HTTPS')?.toLowerCase() ?? undefined,
    publicBaseUrl: env('PUBLIC_BASE_URL'),
    linkCheckTimeoutMs: env('LINK_CHECK_TIMEOUT_MS') ?? undefined,
    accessLog: env('ACCESS_LOG')?.toLowerCase() ?? undefined,
    privacyPolicyPath: path.resolve(process.cwd(), env('PRIVACY_POLICY_PATH') || 'PRIVACY.md'),
    searchRateLimit: env('SEARCH_RATE_LIMIT') ?? undefined,
    upstashUrl: env('UPSTASH_REDIS_REST_URL'),
    upstashToken: env('UPSTASH_REDIS_REST_TOKEN'),
  })
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }
  const c = parsed.data
  return {
    ...c,
    // HTTPS is enforced in production unless explicitly turned off.
    requireHttps: c.requireHttps ?? c.nodeEnv === 'production',
  }
}
