// Keys are stored normalized (see normalizeText) so they can be matched against a normalized query.
export const SYNONYMS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['fuera de ordenacion', ['situacion de fuera de ordenacion', 'no ajustado a ordenacion', 'edificacion disconforme']],
  ['volumen disconforme', ['edificacion disconforme', 'exceso de volumen']],
  ['suelo no urbanizable', ['suelo rustico', 'suelos protegidos', 'suelo no apto para urbanizar']],
  ['garaje ilegal', ['aparcamiento ilegal', 'cochera sin licencia']],
  ['ordenacion', ['planeamiento', 'planeacion', 'ordenacion urbanistica']],
]

export const DEFAULT_SUGGESTIONS = ['ajusta fechas/órgano', 'prueba con términos más generales']
