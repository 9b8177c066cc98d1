export type NoteParts = {
  motivo?: string | null
  accion?: string | null
  sugerencias?: string[] | null
  info?: string | null
}

export function buildNote({ motivo, accion, sugerencias, info }: NoteParts): string | null {
  const parts: string[] = []
  if (motivo) parts.push(`Motivo: ${motivo}`)
  if (accion) parts.push(`Acción: ${accion}`)
  if (sugerencias?.length) parts.push(`Sugerencias: ${sugerencias.join('; ')}`)
  if (info) parts.push(`Info: ${info}`)
  return parts.length ? parts.join(' ') : null
}
