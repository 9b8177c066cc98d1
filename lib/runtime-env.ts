import fs from 'node:fs'
import path from 'node:path'

type ParsedEnv = Record<string, string>

export type EnvLookup = (name: string) => string | null

/** Earlier files take precedence, key by key. */
export const ENV_FILES = ['.env.local', '.env'] as const

const QUOTED = /^(["'])(.*)\1$/

/** KEY=value lines; comments and lines without a key are skipped, the first definition of a key wins. */
export function parseEnvFile(text: string): ParsedEnv {
  const out: ParsedEnv = {}
  for (const line of String(text || '').split(/\r?\n/g).map((l) => l.trim())) {
    if (line.startsWith('#')) continue
    const eq = line.indexOf('=')
    const key = line.slice(0, eq).trim()
    if (eq <= 0 || !key || key in out) continue
    const raw = line.slice(eq + 1).trim()
    out[key] = raw.replace(QUOTED, '$2')
  }
  return out
}

export function readEnvFiles(dir: string, files: readonly string[] = ENV_FILES): ParsedEnv {
  const merged: ParsedEnv = {}
  for (const file of files) {
    let text: string
    try {
      text = fs.readFileSync(path.join(dir, file), 'utf8')
    } catch {
      continue // missing files are normal
    }
    for (const [k, v] of Object.entries(parseEnvFile(text))) {
      if (!(k in merged)) merged[k] = v
    }
  }
  return merged
}

let fromFiles: ParsedEnv | null = null

/** process.env first, then the env files in the working directory (read once). */
export function getRuntimeEnvVar(name: string): string | null {
  const live = String(process.env[name] || '').trim()
  if (live) return live
  if (!fromFiles) fromFiles = readEnvFiles(process.cwd())
  return String(fromFiles[name] || '').trim() || null
}

/** Lookup over a fixed record, for tests and scripted setups. */
export function envFromRecord(env: Record<string, string | undefined>): EnvLookup {
  return (name) => {
    const v = String(env[name] || '').trim()
    return v || null
  }
}
