import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import pg from 'pg';
import { pino } from 'pino';
import { createMetrics } from '../../metrics.js';
import { createHttpApp } from '../app.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('GET /ready (PostgreSQL)', () => {
  let pool: pg.Pool;
  let app: Express;

  beforeAll(() => {
    pool = new pg.Pool({ connectionString: process.env.DATABASE_URL });
    app = createHttpApp({
      pingDatabase: () => pool.query('SELECT 1'),
      metrics: createMetrics({ collectDefaults: false }),
      build: { version: 'test', buildTime: 'unknown', gitCommit: 'unknown' },
      logger: pino({ level: 'silent' }),
    });
  });

  afterAll(async () => {
    await pool.end();
  });

  it('should report ready when the database is reachable', async () => {
    const res = await request(app).get('/ready');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ready' });
  });

  it('should report 503 once the pool is gone', async () => {
    const closed = new pg.Pool({ connectionString: process.env.DATABASE_URL });
    await closed.end();
    const downApp = createHttpApp({
      pingDatabase: () => closed.query('SELECT 1'),
      metrics: createMetrics({ collectDefaults: false }),
      build: { version: 'test', buildTime: 'unknown', gitCommit: 'unknown' },
      logger: pino({ level: 'silent' }),
    });

    const res = await request(downApp).get('/ready');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
  });
});
