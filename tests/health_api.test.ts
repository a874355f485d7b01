import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { chmod } from 'node:fs/promises';

import { createTestServer, type TestServer } from './helpers/server.ts';

describe('Health API endpoints', () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await createTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  describe('GET /api/health/live', () => {
    it('returns 200 with status ok (liveness probe)', async () => {
      const res = await server.app.inject({ method: 'GET', url: '/api/health/live' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'ok' });
    });
  });

  describe('GET /api/health/ready', () => {
    it('returns 200 when the database is reachable', async () => {
      const res = await server.app.inject({ method: 'GET', url: '/api/health/ready' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'ok' });
    });
  });

  describe('GET /api/health', () => {
    it('reports each component without authentication', async () => {
      const res = await server.app.inject({ method: 'GET', url: '/api/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe('healthy');
      expect(typeof body.timestamp).toBe('string');
      expect(body.components.database.status).toBe('healthy');
      expect(body.components.database.details).toEqual({ migrations_applied: 2 });
      expect(body.components.media_storage.status).toBe('healthy');
    });

    it('degrades when the media directory is read-only', async () => {
      // root ignores file modes
      if (process.getuid?.() === 0) return;
      await chmod(server.mediaRoot, 0o555);
      try {
        const res = await server.app.inject({ method: 'GET', url: '/api/health' });
        expect(res.statusCode).toBe(200);
        expect(res.json().status).toBe('degraded');
        expect(res.json().components.media_storage.details).toEqual({ error: 'Media directory is not writable' });
      } finally {
        await chmod(server.mediaRoot, 0o755);
      }
    });
  });
});
