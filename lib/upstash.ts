export type UpstashResp<T> = { result?: T; error?: string }

export type UpstashConfig = { url: string; token: string; timeoutMs: number }

// Rate limiting calls Upstash on the request path.
export const UPSTASH_TIMEOUT_MS = 1500

export function upstashConfig(url: string | null, token: string | null, timeoutMs = UPSTASH_TIMEOUT_MS): UpstashConfig | null {
  const u = String(url || '').replace(/\/$/, '')
  const t = String(token || '')
  if (!u || !t) return null
  return { url: u, token: t, timeoutMs }
}

export async function upstashCmd<T>(conn: UpstashConfig, command: Array<string | number>): Promise<UpstashResp<T>> {
  const resp = await fetch(conn.url, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${conn.token}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(command),
    signal: AbortSignal.timeout(conn.timeoutMs),
  })
  const json = (await resp.json().catch(() => ({}))) as UpstashResp<T>
  if (!resp.ok) return { error: json?.error || `HTTP ${resp.status}` }
  return json
}
