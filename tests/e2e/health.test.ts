import request from 'supertest';

import { TestContext, createTestContext } from '../helpers';

describe('Health Endpoints', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('GET /', () => {
    it('should return API info', async () => {
      const response = await request(ctx.app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('name', 'Cashpoint API');
      expect(response.body).toHaveProperty('version', '1.0.0');
    });
  });

  describe('GET /health/live', () => {
    it('should return alive status', async () => {
      const response = await request(ctx.app).get('/health/live');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'alive');
    });
  });

  describe('GET /health', () => {
    it('should report the ledger store and active sessions', async () => {
      await request(ctx.app).post('/auth/login').send({ pin: '1234' });

      const response = await request(ctx.app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.services).toEqual({
        ledgerStore: { connected: true },
        sessions: { active: 1 },
      });
    });

    it('should be unhealthy when the ledger store is down', async () => {
      ctx.store.healthy = false;

      const response = await request(ctx.app).get('/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('unhealthy');
    });
  });

  describe('GET /health/ready', () => {
    it('should follow the ledger store', async () => {
      const ready = await request(ctx.app).get('/health/ready');
      ctx.store.healthy = false;
      const notReady = await request(ctx.app).get('/health/ready');

      expect(ready.status).toBe(200);
      expect(ready.body.status).toBe('ready');
      expect(notReady.status).toBe(503);
      expect(notReady.body.status).toBe('not ready');
    });
  });

  describe('404 Handler', () => {
    it('should return 404 for unknown routes', async () => {
      const response = await request(ctx.app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(3010);
      expect(response.body.error.message).toBe('Route GET /unknown-route not found');
    });
  });
});
