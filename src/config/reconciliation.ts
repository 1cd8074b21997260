import { z } from 'zod';
import { ClassifierParameters, RuleSetName } from '../rules/types';
import { DataDomain, NameMatcher, NamingPattern, TableIdentifier } from '../types/reconciliation';
import { isValidTimeZone } from '../utils/dates';
import { ConfigurationError } from '../utils/errors';
import { OUTPUT_SCHEMA } from './tableSchemas';

export interface ReconciliationConfig {
  company: string;
  /** Database whose INFORMATION_SCHEMA is searched for source tables */
  catalog: string;
  domains: Record<DataDomain, NamingPattern>;
  /** Schemas or tables containing this marker are never read as sources */
  excludeMarker: string;
  /** campaign_status values that mark a spend record as active */
  activeMarkers: string[];
  ruleSet: RuleSetName;
  groupByPersonnel: boolean;
  target: TableIdentifier;
  clusterBy: string[];
  parameters: ClassifierParameters;
  timeZone: string;
}

const token = z.string().trim().min(1).optional();

const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const ratio = (fallback: number) => z.coerce.number().positive().default(fallback);

const OUTPUT_COLUMNS = new Set(OUTPUT_SCHEMA.map((column) => column.name));

const envSchema = z
  .object({
    RECON_COMPANY: z.string({ required_error: 'RECON_COMPANY is required' }).trim().min(1),
    RECON_CATALOG: token,
    SNOWFLAKE_DATABASE: token,

    RECON_SPEND_SCHEMA_PREFIX: token,
    RECON_SPEND_SCHEMA_SUFFIX: token,
    RECON_SPEND_SCHEMA_CONTAINS: token,
    RECON_SPEND_TABLE_PREFIX: token,
    RECON_SPEND_TABLE_SUFFIX: token,
    RECON_SPEND_TABLE_CONTAINS: token,

    RECON_BUDGET_SCHEMA_PREFIX: token,
    RECON_BUDGET_SCHEMA_SUFFIX: token,
    RECON_BUDGET_SCHEMA_CONTAINS: token,
    RECON_BUDGET_TABLE_PREFIX: token,
    RECON_BUDGET_TABLE_SUFFIX: token,
    RECON_BUDGET_TABLE_CONTAINS: token,

    RECON_EXCLUDE_MARKER: z.string().trim().min(1).default('recon'),
    RECON_ACTIVE_MARKERS: list('🟢,active').refine((markers) => markers.length > 0, {
      message: 'at least one active marker is required',
    }),
    RECON_RULE_SET: z.enum(['pacing', 'threshold']).default('pacing'),
    RECON_GROUP_BY_PERSONNEL: flag,

    RECON_TARGET_CATALOG: token,
    RECON_TARGET_SCHEMA: token,
    RECON_TARGET_TABLE: token,
    RECON_CLUSTER_BY: list('budget_group_1,category_level_1,personnel,track_group').refine(
      (columns) => columns.every((column) => OUTPUT_COLUMNS.has(column)),
      { message: 'cluster keys must be output columns' }
    ),

    RECON_OVER_BUDGET_RATIO: ratio(1.01),
    RECON_COMPLETED_RATIO: ratio(0.99),
    RECON_NEAR_COMPLETION_RATIO: ratio(0.95),
    RECON_PACING_MARGIN: ratio(0.3),
    RECON_GRACE_DAYS: z.coerce.number().int().min(0).default(3),

    RECON_TIMEZONE: z
      .string()
      .default('Asia/Ho_Chi_Minh')
      .refine(isValidTimeZone, { message: 'unknown IANA time zone' }),
  })
  .refine(
    (env) =>
      env.RECON_NEAR_COMPLETION_RATIO <= env.RECON_COMPLETED_RATIO &&
      env.RECON_COMPLETED_RATIO <= env.RECON_OVER_BUDGET_RATIO,
    {
      message: 'ratios must satisfy near completion <= completed <= over budget',
      path: ['RECON_COMPLETED_RATIO'],
    }
  );

type ReconciliationEnv = z.infer<typeof envSchema>;

function matcher(prefix?: string, suffix?: string, contains?: string): NameMatcher {
  const result: NameMatcher = {};
  if (prefix) result.prefix = prefix;
  if (suffix) result.suffix = suffix;
  if (contains) result.contains = contains;
  return result;
}

function domainPatterns(env: ReconciliationEnv): Record<DataDomain, NamingPattern> {
  const company = env.RECON_COMPANY;
  const hasSpendOverride = [
    env.RECON_SPEND_SCHEMA_PREFIX,
    env.RECON_SPEND_SCHEMA_SUFFIX,
    env.RECON_SPEND_SCHEMA_CONTAINS,
    env.RECON_SPEND_TABLE_PREFIX,
    env.RECON_SPEND_TABLE_SUFFIX,
    env.RECON_SPEND_TABLE_CONTAINS,
  ].some(Boolean);
  const hasBudgetOverride = [
    env.RECON_BUDGET_SCHEMA_PREFIX,
    env.RECON_BUDGET_SCHEMA_SUFFIX,
    env.RECON_BUDGET_SCHEMA_CONTAINS,
    env.RECON_BUDGET_TABLE_PREFIX,
    env.RECON_BUDGET_TABLE_SUFFIX,
    env.RECON_BUDGET_TABLE_CONTAINS,
  ].some(Boolean);

  // Per-platform campaign performance marts and the monthly budget allocation mart
  const spend: NamingPattern = hasSpendOverride
    ? {
        schema: matcher(env.RECON_SPEND_SCHEMA_PREFIX, env.RECON_SPEND_SCHEMA_SUFFIX, env.RECON_SPEND_SCHEMA_CONTAINS),
        table: matcher(env.RECON_SPEND_TABLE_PREFIX, env.RECON_SPEND_TABLE_SUFFIX, env.RECON_SPEND_TABLE_CONTAINS),
      }
    : {
        schema: { prefix: `${company}_dataset_`, suffix: '_api_mart' },
        table: { suffix: '_all_all_campaign_performance' },
      };
  const budget: NamingPattern = hasBudgetOverride
    ? {
        schema: matcher(env.RECON_BUDGET_SCHEMA_PREFIX, env.RECON_BUDGET_SCHEMA_SUFFIX, env.RECON_BUDGET_SCHEMA_CONTAINS),
        table: matcher(env.RECON_BUDGET_TABLE_PREFIX, env.RECON_BUDGET_TABLE_SUFFIX, env.RECON_BUDGET_TABLE_CONTAINS),
      }
    : {
        schema: { prefix: `${company}_dataset_budget`, suffix: '_mart' },
        // Per-event allocation tables share the mart and repeat rows of the consolidated one
        table: { suffix: '_table_budget_all_all_allocation_monthly' },
      };

  return { spend, budget };
}

export function loadReconciliationConfig(env: NodeJS.ProcessEnv = process.env): ReconciliationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid reconciliation configuration: ${issues.join('; ')}`, { issues });
  }

  const values = parsed.data;
  const company = values.RECON_COMPANY;
  const catalog = values.RECON_CATALOG ?? values.SNOWFLAKE_DATABASE ?? 'MARKETING';

  return {
    company,
    catalog,
    domains: domainPatterns(values),
    excludeMarker: values.RECON_EXCLUDE_MARKER,
    activeMarkers: values.RECON_ACTIVE_MARKERS,
    ruleSet: values.RECON_RULE_SET,
    groupByPersonnel: values.RECON_GROUP_BY_PERSONNEL,
    target: {
      catalog: values.RECON_TARGET_CATALOG ?? catalog,
      schema: values.RECON_TARGET_SCHEMA ?? `${company}_dataset_recon_mart`,
      table: values.RECON_TARGET_TABLE ?? `${company}_table_recon_all_all_recon_spend`,
    },
    clusterBy: values.RECON_CLUSTER_BY,
    parameters: {
      overBudgetRatio: values.RECON_OVER_BUDGET_RATIO,
      completedRatio: values.RECON_COMPLETED_RATIO,
      nearCompletionRatio: values.RECON_NEAR_COMPLETION_RATIO,
      pacingMargin: values.RECON_PACING_MARGIN,
      graceDays: values.RECON_GRACE_DAYS,
    },
    timeZone: values.RECON_TIMEZONE,
  };
}
