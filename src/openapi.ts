import { SORT_ORDERS } from '../core/ranking.js'

const resultSchema = {
  type: 'object',
  properties: {
    titulo: { type: 'string' },
    organo: { type: 'string' },
    sala: { type: 'string' },
    ponente: { type: 'string' },
    fecha: { type: 'string', format: 'date' },
    relevancia: { type: 'number' },
    resumen: { type: 'string' },
    id_cendoj: { type: 'string' },
    roj: { type: 'string' },
    ecli: { type: 'string' },
    url_directo: { type: 'string', format: 'uri' },
    url_estable: { type: 'string', format: 'uri' },
    url_estable_secundaria: { type: 'string', format: 'uri' },
    enlace_preferido: { type: 'string', format: 'uri' },
    enlace_directo_ok: { type: ['boolean', 'null'] },
    estrategia_enlace: { type: 'string', enum: ['directo', 'estable'] },
  },
} as const

/** OpenAPI document used to register the Action with an agent platform. */
export function openApiDocument(publicBaseUrl: string | null) {
  return {
    openapi: '3.1.0',
    info: {
      title: 'CENDOJ Action',
      version: '1.7.0',
      description: 'Búsqueda simulada de jurisprudencia del CENDOJ. Las consultas no se almacenan.',
    },
    ...(publicBaseUrl ? { servers: [{ url: publicBaseUrl }] } : {}),
    paths: {
      '/buscar-cendoj': {
        get: {
          operationId: 'buscarCendoj',
          summary: 'Buscar sentencias (mock)',
          parameters: [
            { name: 'query', in: 'query', required: true, description: 'Términos de búsqueda', schema: { type: 'string', minLength: 1 } },
            { name: 'organo', in: 'query', required: false, schema: { type: 'string' } },
            { name: 'desde', in: 'query', required: false, schema: { type: 'string', format: 'date' } },
            { name: 'hasta', in: 'query', required: false, schema: { type: 'string', format: 'date' } },
            { name: 'orden', in: 'query', required: false, schema: { type: 'string', enum: [...SORT_ORDERS], default: 'relevancia_desc' } },
            { name: 'limite', in: 'query', required: false, schema: { type: 'integer', minimum: 1, maximum: 50, default: 10 } },
            { name: 'validar_enlaces', in: 'query', required: false, schema: { type: 'boolean', default: false } },
          ],
          responses: {
            '200': {
              description: 'Resultados',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      ok: { type: 'boolean' },
                      query: { type: 'string' },
                      total: { type: 'integer' },
                      resultados: { type: 'array', items: resultSchema },
                      nota: { type: ['string', 'null'] },
                    },
                  },
                },
              },
            },
            '422': { description: 'Parámetros no válidos' },
            '429': { description: 'Demasiadas peticiones' },
          },
        },
      },
    },
  }
}
