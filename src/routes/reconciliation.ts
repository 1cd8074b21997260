import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/errorHandler';
import { strictRateLimiterMiddleware } from '../middleware/rateLimiter';
import { ReconciliationConfig } from '../config/reconciliation';
import { RULE_SETS, getRuleSet } from '../rules';
import { MartQueryService } from '../services/martQueryService';
import { ReconciliationEngine, RunReport, reconcileInMemory } from '../services/reconciliationEngine';
import { ExplainedRow } from '../services/statusClassifier';
import { ApiResponse } from '../types/reconciliation';
import { isIsoDate } from '../utils/dates';
import { createLogger } from '../utils/logger';

const logger = createLogger('routes');

const MAX_PREVIEW_ROWS = 5000;

const text = z.string().nullable().default(null);
const amount = z.number().finite().nullable().default(null);
const isoDate = z.string().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' });

const keyShape = {
  budget_group_1: text,
  budget_group_2: text,
  region: text,
  category_level_1: text,
  track_group: text,
  pillar_group: text,
  content_group: text,
  platform: text,
  objective: text,
  month: text,
  year: z.number().int().nullable().default(null),
};

const budgetRowSchema = z.object({
  ...keyShape,
  initial_budget: amount,
  adjusted_budget: amount,
  additional_budget: amount,
  actual_budget: amount,
  grouped_marketing_budget: amount,
  grouped_supplier_budget: amount,
  grouped_store_retail: amount,
  grouped_customer_budget: amount,
  grouped_recruitment_budget: amount,
  start_date: isoDate.nullable().default(null),
  end_date: isoDate.nullable().default(null),
  total_effective_time: z.number().int().nullable().default(null),
  total_passed_time: z.number().int().nullable().default(null),
});

const spendRowSchema = z.object({
  ...keyShape,
  personnel: z.string().nullable().optional(),
  spend: amount,
  campaign_status: text,
});

const ruleSetName = z.enum(['pacing', 'threshold']);

const previewSchema = z.object({
  asOf: isoDate.optional(),
  ruleSet: ruleSetName.optional(),
  groupByPersonnel: z.boolean().optional(),
  budget: z.array(budgetRowSchema).max(MAX_PREVIEW_ROWS).default([]),
  spend: z.array(spendRowSchema).max(MAX_PREVIEW_ROWS).default([]),
});

const runSchema = z.object({
  asOf: isoDate.optional(),
  ruleSet: ruleSetName.optional(),
  groupByPersonnel: z.boolean().optional(),
});

const filterValue = z.string().trim().min(1).optional();

const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  status: filterValue,
  personnel: filterValue,
  budget_group_1: filterValue,
  budget_group_2: filterValue,
  region: filterValue,
  category_level_1: filterValue,
  track_group: filterValue,
  pillar_group: filterValue,
  content_group: filterValue,
  platform: filterValue,
  objective: filterValue,
  month: filterValue,
  year: z.string().regex(/^\d{4}$/, 'expected a four digit year').optional(),
});

export interface ReconciliationRouterDeps {
  engine: ReconciliationEngine;
  martQuery: MartQueryService;
  config: ReconciliationConfig;
}

export function createReconciliationRouter({ engine, martQuery, config }: ReconciliationRouterDeps): Router {
  const router = Router();

  // GET /api/v1/reconciliation - Paginated mart rows
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const { page, limit, ...filters } = listQuerySchema.parse(req.query);
    const result = await martQuery.list({ filters, page, limit });
    const totalPages = Math.ceil(result.total / limit);

    const response: ApiResponse<typeof result.rows> = {
      success: true,
      data: result.rows,
      pagination: {
        page,
        limit,
        total: result.total,
        totalPages,
        hasNext: page < totalPages,
        hasPrev: page > 1,
      },
      metadata: {
        executionTime: result.executionTime,
        filters,
      },
    };

    res.json(response);
  }));

  // GET /api/v1/reconciliation/summary - Totals per status
  router.get('/summary', asyncHandler(async (_req: Request, res: Response) => {
    const summary = await martQuery.summary();
    res.json({
      success: true,
      data: summary,
      metadata: {
        totalRows: summary.reduce((sum, row) => sum + row.rowCount, 0),
      },
    });
  }));

  // GET /api/v1/reconciliation/rule-sets - Rule tables in evaluation order
  router.get('/rule-sets', (_req: Request, res: Response) => {
    const data = Object.values(RULE_SETS).map((ruleSet) => ({
      name: ruleSet.name,
      version: ruleSet.version,
      description: ruleSet.description,
      isDefault: ruleSet.name === config.ruleSet,
      rules: ruleSet.rules.map((rule, index) => ({ order: index + 1, id: rule.id, label: rule.label })),
      fallback: ruleSet.fallback,
    }));
    res.json({ success: true, data });
  });

  // POST /api/v1/reconciliation/preview - Classify posted rows without touching the warehouse
  router.post('/preview', asyncHandler(async (req: Request, res: Response) => {
    const body = previewSchema.parse(req.body);
    const asOf = engine.resolveAsOf(body.asOf);
    const ruleSet = getRuleSet(body.ruleSet ?? config.ruleSet);

    const rows = reconcileInMemory(
      { budget: [body.budget], spend: [body.spend] },
      {
        asOf,
        ruleSet,
        parameters: config.parameters,
        groupByPersonnel: body.groupByPersonnel ?? config.groupByPersonnel,
        activeMarkers: config.activeMarkers,
      }
    );

    const response: ApiResponse<ExplainedRow[]> = {
      success: true,
      data: rows,
      metadata: { asOf, ruleSet: ruleSet.name, version: ruleSet.version, rowCount: rows.length },
    };
    res.json(response);
  }));

  // POST /api/v1/reconciliation/runs - Rebuild the mart
  router.post('/runs', strictRateLimiterMiddleware, asyncHandler(async (req: Request, res: Response) => {
    const options = runSchema.parse(req.body ?? {});
    logger.info('Reconciliation run requested', { ...options, ip: req.ip });

    const report = await engine.run(options);
    martQuery.invalidate();
    const response: ApiResponse<RunReport> = {
      success: true,
      data: report,
      message: `Replaced ${report.target} with ${report.rowCount} rows`,
    };
    res.status(201).json(response);
  }));

  return router;
}
