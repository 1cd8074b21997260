import { ReconciliationConfig } from '../config/reconciliation';
import { BUDGET_SOURCE_SCHEMA, RECONCILIATION_SCHEMA, spendSourceSchema } from '../config/tableSchemas';
import { getRuleSet } from '../rules';
import { ClassifierParameters, EvaluationContext, RuleSet, RuleSetName } from '../rules/types';
import {
  BudgetRecord,
  DataDomain,
  KEY_FIELDS,
  RawSpendRecord,
  TableIdentifier,
  Warehouse,
} from '../types/reconciliation';
import { isIsoDate, todayInTimeZone } from '../utils/dates';
import { InputValidationError, RunInProgressError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { dateLiteral, displayName, indent } from '../utils/sql';
import { buildJoinSql, joinBudgetSpend } from './budgetSpendJoiner';
import { MartMaterializer } from './martMaterializer';
import { buildUnionSql, unionRows, validateSourceSchemas } from './schemaStableUnion';
import { aggregateSpend, buildAggregationSql } from './spendAggregator';
import { ExplainedRow, buildStatusCaseSql, explainRows } from './statusClassifier';
import { TableDiscoveryService } from './tableDiscoveryService';

const logger = createLogger('engine');

export interface RunOptions {
  /** Evaluation date, YYYY-MM-DD; defaults to today in the configured time zone */
  asOf?: string;
  ruleSet?: RuleSetName;
  groupByPersonnel?: boolean;
  target?: TableIdentifier;
}

export interface ReconciliationSqlInput {
  spendTables: readonly TableIdentifier[];
  budgetTables: readonly TableIdentifier[];
  ruleSet: RuleSet;
  context: EvaluationContext;
  groupByPersonnel: boolean;
  activeMarkers: readonly string[];
}

export type DiscoveredTables = Record<DataDomain, TableIdentifier[]>;

export interface RunPlan {
  asOf: string;
  ruleSet: RuleSet;
  groupByPersonnel: boolean;
  target: TableIdentifier;
  tables: DiscoveredTables;
  selectSql: string;
}

export interface RunReport {
  target: string;
  ruleSet: RuleSetName;
  asOf: string;
  spendTables: string[];
  budgetTables: string[];
  rowCount: number;
  durationMs: number;
}

/**
 * The whole pipeline as one SELECT: union each domain, aggregate spend,
 * outer join, classify. Identical inputs always render identical SQL.
 */
export function buildReconciliationSql(input: ReconciliationSqlInput): string {
  const columns = RECONCILIATION_SCHEMA.map((column) => column.name);
  const ctes: [string, string][] = [
    ['spend_source', buildUnionSql(input.spendTables, spendSourceSchema(input.groupByPersonnel))],
    [
      'spend_aggregated',
      buildAggregationSql('spend_source', {
        groupByPersonnel: input.groupByPersonnel,
        activeMarkers: input.activeMarkers,
      }),
    ],
    ['budget_source', buildUnionSql(input.budgetTables, BUDGET_SOURCE_SCHEMA)],
    ['reconciled', buildJoinSql('budget_source', 'spend_aggregated')],
  ];

  return [
    `WITH ${ctes.map(([name, sql]) => `${name} AS (\n${indent(sql)}\n)`).join(',\n')}`,
    'SELECT',
    `  ${columns.join(',\n  ')},`,
    `${indent(buildStatusCaseSql(input.ruleSet, input.context))} AS status,`,
    `  ${dateLiteral(input.context.asOf)} AS as_of_date`,
    'FROM reconciled',
    `ORDER BY ${[...KEY_FIELDS, 'personnel'].join(', ')}`,
  ].join('\n');
}

export interface InMemoryInput {
  budget: readonly (readonly BudgetRecord[])[];
  spend: readonly (readonly RawSpendRecord[])[];
}

export interface InMemoryOptions {
  asOf: string;
  ruleSet: RuleSet;
  parameters: ClassifierParameters;
  groupByPersonnel: boolean;
  activeMarkers: readonly string[];
}

// Same stages as the warehouse statement, run over rows held in memory
export function reconcileInMemory(input: InMemoryInput, options: InMemoryOptions): ExplainedRow[] {
  const spend = aggregateSpend(unionRows(spendSourceSchema(options.groupByPersonnel), input.spend), {
    groupByPersonnel: options.groupByPersonnel,
    activeMarkers: options.activeMarkers,
  });
  const budget = unionRows(BUDGET_SOURCE_SCHEMA, input.budget);
  const joined = joinBudgetSpend(budget, spend);
  return explainRows(joined.rows, options.ruleSet, { asOf: options.asOf, parameters: options.parameters });
}

export class ReconciliationEngine {
  private readonly discovery: TableDiscoveryService;
  private readonly materializer: MartMaterializer;
  private runningSince: string | null = null;

  constructor(
    private readonly warehouse: Warehouse,
    private readonly config: ReconciliationConfig,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.discovery = new TableDiscoveryService(warehouse, config.catalog, config.excludeMarker);
    this.materializer = new MartMaterializer(warehouse);
  }

  get isRunning(): boolean {
    return this.runningSince !== null;
  }

  resolveAsOf(asOf?: string): string {
    if (asOf === undefined) {
      return todayInTimeZone(this.config.timeZone, this.clock());
    }
    if (!isIsoDate(asOf)) {
      throw new InputValidationError(`Invalid asOf "${asOf}": expected a YYYY-MM-DD calendar date`, { asOf });
    }
    return asOf;
  }

  async discover(): Promise<DiscoveredTables> {
    const spend = await this.discovery.discoverTables('spend', this.config.domains.spend);
    const budget = await this.discovery.discoverTables('budget', this.config.domains.budget);
    return { spend, budget };
  }

  /** Discover sources and render the statement without touching the mart. */
  async plan(options: RunOptions = {}): Promise<RunPlan> {
    const asOf = this.resolveAsOf(options.asOf);
    const ruleSet = getRuleSet(options.ruleSet ?? this.config.ruleSet);
    const groupByPersonnel = options.groupByPersonnel ?? this.config.groupByPersonnel;
    const target = options.target ?? this.config.target;
    const tables = await this.discover();

    const selectSql = buildReconciliationSql({
      spendTables: tables.spend,
      budgetTables: tables.budget,
      ruleSet,
      context: { asOf, parameters: this.config.parameters },
      groupByPersonnel,
      activeMarkers: this.config.activeMarkers,
    });

    return { asOf, ruleSet, groupByPersonnel, target, tables, selectSql };
  }

  /**
   * Discover, validate and replace the mart. Any structural failure aborts
   * before the materializing statement is sent.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    if (this.runningSince !== null) {
      throw new RunInProgressError(this.runningSince);
    }
    this.runningSince = this.clock().toISOString();
    const startTime = Date.now();

    try {
      const plan = await this.plan(options);
      logger.info('Starting reconciliation run', {
        asOf: plan.asOf,
        ruleSet: plan.ruleSet.name,
        version: plan.ruleSet.version,
        target: displayName(plan.target),
      });

      await validateSourceSchemas(this.warehouse, [
        { tables: plan.tables.spend, schema: spendSourceSchema(plan.groupByPersonnel) },
        { tables: plan.tables.budget, schema: BUDGET_SOURCE_SCHEMA },
      ]);

      const rowCount = await this.materializer.materialize(plan.target, plan.selectSql, this.config.clusterBy);

      const report: RunReport = {
        target: displayName(plan.target),
        ruleSet: plan.ruleSet.name,
        asOf: plan.asOf,
        spendTables: plan.tables.spend.map(displayName),
        budgetTables: plan.tables.budget.map(displayName),
        rowCount,
        durationMs: Date.now() - startTime,
      };
      logger.info('Reconciliation run completed', { ...report });
      return report;
    } catch (error) {
      logger.error('Reconciliation run failed', {
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startTime,
      });
      throw error;
    } finally {
      this.runningSince = null;
    }
  }
}
