import type { LinkChecker } from '../../core/search.js'

export const USER_AGENT = 'CENDOJ-Action/1.7'

/** HEAD request; 2xx/3xx counts as reachable, anything else (timeouts included) as not. */
export function createHeadChecker(opts: { timeoutMs: number; fetchImpl?: typeof fetch }): LinkChecker {
  const doFetch = opts.fetchImpl ?? fetch
  return async (url) => {
    try {
      const resp = await doFetch(url, {
        method: 'HEAD',
        headers: { 'User-Agent': USER_AGENT },
        redirect: 'follow',
        signal: AbortSignal.timeout(opts.timeoutMs),
      })
      return resp.status >= 200 && resp.status < 400
    } catch (e: unknown) {
      console.warn('[LINKS] HEAD check failed', { url, error: e instanceof Error ? e.message : String(e) })
      return false
    }
  }
}
