/**
 * OpenAPI path definitions for user accounts.
 * Routes: POST /api/user/create, POST /api/user/token,
 *         GET/PUT/PATCH /api/user/me
 */
import type { OpenApiDomainModule } from '../types.ts';
import { errorResponses, jsonBody, jsonResponse, ref } from '../helpers.ts';

export function usersPaths(): OpenApiDomainModule {
  return {
    tags: [{ name: 'Users', description: 'Registration, tokens and the caller profile' }],
    schemas: {
      UserProfile: {
        type: 'object',
        required: ['email', 'name'],
        properties: {
          email: { type: 'string', format: 'email', example: 'cook@example.com' },
          name: { type: 'string', example: 'Test Cook' },
        },
      },
      UserInput: {
        type: 'object',
        required: ['email', 'password', 'name'],
        properties: {
          email: { type: 'string', format: 'email', description: 'Domain part is stored lower-cased' },
          password: { type: 'string', minLength: 5, writeOnly: true },
          name: { type: 'string', maxLength: 255 },
        },
      },
      TokenRequest: {
        type: 'object',
        required: ['email', 'password'],
        properties: {
          email: { type: 'string', format: 'email' },
          password: { type: 'string', writeOnly: true },
        },
      },
      TokenResponse: {
        type: 'object',
        required: ['token'],
        properties: {
          token: { type: 'string', description: 'Send as `Authorization: Bearer <token>`' },
        },
      },
    },
    paths: {
      '/api/user/create': {
        post: {
          operationId: 'createUser',
          summary: 'Register a new user',
          tags: ['Users'],
          security: [],
          requestBody: jsonBody(ref('UserInput')),
          responses: {
            '201': jsonResponse('User created', ref('UserProfile')),
            ...errorResponses(400),
          },
        },
      },
      '/api/user/token': {
        post: {
          operationId: 'createToken',
          summary: 'Exchange email and password for a bearer token',
          tags: ['Users'],
          security: [],
          requestBody: jsonBody(ref('TokenRequest')),
          responses: {
            '200': jsonResponse('Token issued', ref('TokenResponse')),
            ...errorResponses(400, 429),
          },
        },
      },
      '/api/user/me': {
        get: {
          operationId: 'getMe',
          summary: 'Profile of the authenticated user',
          tags: ['Users'],
          responses: {
            '200': jsonResponse('Profile', ref('UserProfile')),
            ...errorResponses(401),
          },
        },
        put: {
          operationId: 'replaceMe',
          summary: 'Replace email, name and password',
          tags: ['Users'],
          requestBody: jsonBody(ref('UserInput')),
          responses: {
            '200': jsonResponse('Updated profile', ref('UserProfile')),
            ...errorResponses(400, 401),
          },
        },
        patch: {
          operationId: 'updateMe',
          summary: 'Update any of email, name and password',
          tags: ['Users'],
          requestBody: jsonBody(ref('UserInput')),
          responses: {
            '200': jsonResponse('Updated profile', ref('UserProfile')),
            ...errorResponses(400, 401),
          },
        },
      },
    },
  };
}
