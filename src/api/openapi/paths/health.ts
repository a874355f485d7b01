/**
 * OpenAPI path definitions for health checks and the spec endpoint.
 * Routes: GET /api/health, GET /api/health/live, GET /api/health/ready,
 *         GET /api/openapi.json
 */
import type { OpenApiDomainModule } from '../types.ts';
import { errorResponses, jsonResponse, ref } from '../helpers.ts';

export function healthPaths(): OpenApiDomainModule {
  return {
    tags: [
      { name: 'Health', description: 'Health checks and system status' },
      { name: 'Discovery', description: 'OpenAPI specification' },
    ],
    schemas: {
      HealthResponse: {
        type: 'object',
        required: ['status', 'timestamp', 'components'],
        properties: {
          status: {
            type: 'string',
            enum: ['healthy', 'degraded', 'unhealthy'],
            description: 'Overall system health status',
            example: 'healthy',
          },
          timestamp: {
            type: 'string',
            format: 'date-time',
            example: '2026-02-21T14:30:00Z',
          },
          components: {
            type: 'object',
            description: 'Per-component health statuses keyed by component name',
            additionalProperties: {
              type: 'object',
              properties: {
                status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy'] },
                latency_ms: { type: 'number', example: 3 },
                details: { type: 'object' },
              },
              required: ['status'],
            },
            example: {
              database: { status: 'healthy', latency_ms: 3, details: { migrations_applied: 2 } },
              media_storage: { status: 'healthy', latency_ms: 1 },
            },
          },
        },
      },
      LivenessResponse: {
        type: 'object',
        required: ['status'],
        properties: {
          status: {
            type: 'string',
            description: 'Always "ok" while the process is running',
            example: 'ok',
          },
        },
      },
    },
    paths: {
      '/api/health': {
        get: {
          operationId: 'getHealth',
          summary: 'Detailed health check',
          description: 'Reports the database and media storage. Returns 503 when the database is unhealthy.',
          tags: ['Health'],
          security: [],
          responses: {
            '200': jsonResponse('System healthy or degraded', ref('HealthResponse')),
            ...errorResponses(503),
          },
        },
      },
      '/api/health/live': {
        get: {
          operationId: 'getLiveness',
          summary: 'Liveness probe',
          tags: ['Health'],
          security: [],
          responses: {
            '200': jsonResponse('Server is alive', ref('LivenessResponse')),
          },
        },
      },
      '/api/health/ready': {
        get: {
          operationId: 'getReadiness',
          summary: 'Readiness probe',
          description: 'Returns 503 until the database answers.',
          tags: ['Health'],
          security: [],
          responses: {
            '200': jsonResponse('System ready', ref('LivenessResponse')),
            ...errorResponses(503),
          },
        },
      },
      '/api/openapi.json': {
        get: {
          operationId: 'getOpenApiSpec',
          summary: 'OpenAPI specification',
          tags: ['Discovery'],
          security: [],
          responses: {
            '200': jsonResponse('OpenAPI 3.0.3 specification document', {
              type: 'object',
              required: ['openapi', 'info', 'paths'],
            }),
          },
        },
      },
    },
  };
}
