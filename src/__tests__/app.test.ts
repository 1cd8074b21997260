jest.mock('snowflake-sdk', () => ({
  createConnection: jest.fn(() => ({
    connect: jest.fn((cb: (err: Error | undefined) => void) => cb(new Error('Network is unreachable'))),
    execute: jest.fn(),
    destroy: jest.fn(),
  })),
}));

import { Server } from 'http';
import { createApp } from '../app';
import { loadReconciliationConfig } from '../config/reconciliation';
import { ReconciliationEngine } from '../services/reconciliationEngine';
import { SnowflakeService } from '../services/snowflakeService';
import { FakeWarehouse } from './fixtures';

describe('API application', () => {
  const config = loadReconciliationConfig({ RECON_COMPANY: 'acme', SNOWFLAKE_DATABASE: 'MARKETING' });
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const engine = new ReconciliationEngine(new FakeWarehouse(), config);
    const app = createApp({ warehouse: new SnowflakeService(), engine, config });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    baseUrl = `http://127.0.0.1:${typeof address === 'object' && address !== null ? address.port : 0}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  it('answers liveness without the warehouse', async () => {
    const response = await fetch(`${baseUrl}/health/simple`);
    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ status: 'healthy' });
  });

  it('reports a degraded service when Snowflake is unreachable', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(503);
    await expect(response.json()).resolves.toMatchObject({
      status: 'degraded',
      services: { snowflake: { status: 'down' }, reconciliation: { running: false } },
    });
  });

  it('counts discoverable sources in the detailed check', async () => {
    const response = await fetch(`${baseUrl}/health/detailed`);
    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ sources: { spendTables: 0, budgetTables: 0 } });
  });

  it('sets rate limit headers', async () => {
    const response = await fetch(`${baseUrl}/api/v1/reconciliation/rule-sets`);
    expect(response.status).toBe(200);
    expect(response.headers.get('x-ratelimit-limit')).toBe('100');
  });

  it('answers unknown routes with 404', async () => {
    const response = await fetch(`${baseUrl}/api/v1/unknown`);
    expect(response.status).toBe(404);
  });
});
