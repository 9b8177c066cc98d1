export type CaseRecord = {
  /** Normalized keyword the record answers to. */
  match: string
  titulo: string
  organo: string
  sala: string
  ponente: string
  fecha: string // YYYY-MM-DD
  relevancia: number // 0-1
  resumen: string
  id_cendoj: string
  roj: string
  ecli: string
}

// Simulated corpus. Ids, ECLI and ROJ stay fixed so smoke tests can rely on them.
export const MOCK_CASES: readonly CaseRecord[] = [
  {
    match: 'urbanizable',
    titulo: 'Licencia urbanística en suelo no urbanizable: criterios recientes',
    organo: 'Tribunal Superior de Justicia de Cataluña (TSJC)',
    sala: 'Sala de lo Contencioso-Administrativo',
    ponente: 'Ponente C',
    fecha: '2024-02-12',
    relevancia: 0.76,
    resumen:
      'Licencia urbanística en suelo no urbanizable: criterios recientes (Tribunal Superior de Justicia de Cataluña (TSJC) - Sala de lo Contencioso-Administrativo) Fecha: 2024-02-12.',
    id_cendoj: '0801932001202400077',
    roj: 'STS 1234/2024',
    ecli: 'ECLI:ES:TS:2024:1234',
  },
  {
    match: 'ordenacion',
    titulo: "Sentencia ejemplo sobre 'fuera de ordenación' en suelo urbano",
    organo: 'Tribunal Supremo (TS)',
    sala: 'Sala Tercera (Cont.-Adm.)',
    ponente: 'Ponente B',
    fecha: '2022-11-03',
    relevancia: 0.82,
    resumen:
      "Sentencia ejemplo sobre 'fuera de ordenación' en suelo urbano (Tribunal Supremo (TS) - Sala Tercera (Cont.-Adm.)) Fecha: 2022-11-03.",
    id_cendoj: '28079130012022000456',
    roj: 'STS 456/2022',
    ecli: 'ECLI:ES:TS:2022:456',
  },
]
