import express from 'express';
import { Server } from 'http';
import { loadReconciliationConfig } from '../config/reconciliation';
import { errorHandler } from '../middleware/errorHandler';
import { createReconciliationRouter } from '../routes/reconciliation';
import { MartQueryService } from '../services/martQueryService';
import { ReconciliationEngine } from '../services/reconciliationEngine';
import { STATUS_LABELS } from '../types/reconciliation';
import { WarehouseError } from '../utils/errors';
import { FakeWarehouse, QueryHandler, budgetRecord, spendRecord } from './fixtures';

const config = loadReconciliationConfig({ RECON_COMPANY: 'acme', SNOWFLAKE_DATABASE: 'MARKETING' });

interface TestServer {
  warehouse: FakeWarehouse;
  request: (path: string, init?: { method: string; body: unknown }) => Promise<{ status: number; body: unknown }>;
  close: () => Promise<void>;
}

async function startServer(handler?: QueryHandler): Promise<TestServer> {
  const warehouse = new FakeWarehouse(handler);
  const engine = new ReconciliationEngine(warehouse, config, () => new Date('2024-06-15T03:00:00Z'));

  const app = express();
  app.use(express.json());
  app.use(
    '/api/v1/reconciliation',
    createReconciliationRouter({ engine, config, martQuery: new MartQueryService(warehouse, config.target) })
  );
  app.use(errorHandler);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  return {
    warehouse,
    request: async (path, init) => {
      const response = await fetch(`http://127.0.0.1:${port}/api/v1/reconciliation${path}`, {
        method: init?.method ?? 'GET',
        headers: { 'Content-Type': 'application/json' },
        body: init === undefined ? undefined : JSON.stringify(init.body),
      });
      return { status: response.status, body: await response.json() };
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

describe('Reconciliation routes', () => {
  let server: TestServer;

  afterEach(async () => {
    await server.close();
  });

  it('lists rule sets in evaluation order', async () => {
    server = await startServer();
    const { status, body } = await server.request('/rule-sets');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: [
        {
          name: 'pacing',
          isDefault: true,
          rules: expect.arrayContaining([{ order: 1, id: 'spend-without-budget-active', label: '🔴 Spend without Budget' }]),
          fallback: STATUS_LABELS.UNRECOGNIZED,
        },
        { name: 'threshold', isDefault: false },
      ],
    });
  });

  it('pages through the published mart', async () => {
    server = await startServer((sqlText) =>
      sqlText.startsWith('SELECT COUNT(*)') ? [{ TOTAL_COUNT: 3 }] : [{ REGION: 'north', STATUS: STATUS_LABELS.DELAYED }]
    );
    const { status, body } = await server.request('/?region=north&page=2&limit=1');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      data: [{ region: 'north', status: STATUS_LABELS.DELAYED }],
      pagination: { page: 2, limit: 1, total: 3, totalPages: 3, hasNext: true, hasPrev: true },
      metadata: { filters: { region: 'north' } },
    });
    expect(server.warehouse.statements[0].binds).toEqual(['north']);
    expect(server.warehouse.statements[0].sqlText.endsWith('LIMIT 1 OFFSET 1')).toBe(true);
  });

  it('rejects malformed filters', async () => {
    server = await startServer();
    const { status, body } = await server.request('/?year=24');

    expect(status).toBe(400);
    expect(body).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR', message: 'year: expected a four digit year' } });
    expect(server.warehouse.statements).toHaveLength(0);
  });

  it('previews posted rows without touching the warehouse', async () => {
    server = await startServer();
    const { status, body } = await server.request('/preview', {
      method: 'POST',
      body: {
        asOf: '2024-06-15',
        budget: [budgetRecord({ platform: 'meta', start_date: '2024-06-20' })],
        spend: [spendRecord({ platform: 'tiktok', spend: 80, campaign_status: '⚫' })],
      },
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      data: [
        { platform: 'meta', status: STATUS_LABELS.NOT_YET_STARTED, rule_id: 'not-yet-started', as_of_date: '2024-06-15' },
        {
          platform: 'tiktok',
          status: STATUS_LABELS.SPEND_WITHOUT_BUDGET_INACTIVE,
          rule_id: 'spend-without-budget-inactive',
        },
      ],
      metadata: { asOf: '2024-06-15', ruleSet: 'pacing', version: 2, rowCount: 2 },
    });
    expect(server.warehouse.statements).toHaveLength(0);
  });

  it('rejects an invalid preview date', async () => {
    server = await startServer();
    const { status, body } = await server.request('/preview', { method: 'POST', body: { asOf: '2024-02-30' } });

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: { code: 'VALIDATION_ERROR', message: 'asOf: expected a YYYY-MM-DD date' } });
  });

  it('rebuilds the mart on request', async () => {
    server = await startServer((sqlText) => (sqlText.startsWith('SELECT COUNT(*)') ? [{ ROW_COUNT: 0 }] : []));
    const { status, body } = await server.request('/runs', { method: 'POST', body: { asOf: '2024-06-15' } });

    expect(status).toBe(201);
    expect(body).toMatchObject({
      success: true,
      data: {
        target: 'MARKETING.acme_dataset_recon_mart.acme_table_recon_all_all_recon_spend',
        ruleSet: 'pacing',
        asOf: '2024-06-15',
        rowCount: 0,
      },
      message: 'Replaced MARKETING.acme_dataset_recon_mart.acme_table_recon_all_all_recon_spend with 0 rows',
    });
    expect(server.warehouse.clearedCaches).toEqual(['mart:']);
  });

  it('answers discovery failures with the error code', async () => {
    server = await startServer(() => new WarehouseError('Query failed: warehouse suspended'));
    const { status, body } = await server.request('/runs', { method: 'POST', body: {} });

    expect(status).toBe(502);
    expect(body).toMatchObject({
      success: false,
      error: { code: 'DISCOVERY_ERROR', message: 'Table discovery for spend failed: Query failed: warehouse suspended' },
    });
    expect(server.warehouse.clearedCaches).toEqual([]);
  });
});
