const CENDOJ_BASE = 'https://www.poderjudicial.es/search'

export function directLink(idCendoj: string) {
  return `${CENDOJ_BASE}/cedula.jsp?id=${encodeURIComponent(idCendoj)}`
}

/** Public CENDOJ search page; the user types the ECLI/ROJ/id there. */
export function stableLink() {
  return `${CENDOJ_BASE}/indexAN.jsp`
}

export function secondaryStableLink(ecli: string, roj: string) {
  const q = `site:poderjudicial.es ${ecli || ''} ${roj || ''}`.trim()
  return `https://www.google.com/search?${new URLSearchParams({ q }).toString()}`
}
