#!/usr/bin/env node
/**
 * Reconciliation runner
 *
 * Commands:
 *   budget-recon run       [--as-of <date>] [--rule-set <name>] [--personnel] [--target <name>] [--json]
 *   budget-recon plan      [--as-of <date>] [--rule-set <name>] [--personnel] [--target <name>]
 *   budget-recon discover  [--json]
 *   budget-recon rule-sets
 *
 * Exit codes:
 *   0 - success, mart replaced
 *   2 - invalid configuration, input or source schema
 *   3 - warehouse failure (discovery, materialization, connection)
 *   4 - unexpected bug
 */

import dotenv from 'dotenv';

dotenv.config();

import { Command } from 'commander';
import { z } from 'zod';
import { ReconciliationConfig, loadReconciliationConfig } from './config/reconciliation';
import { RULE_SETS } from './rules';
import { ReconciliationEngine, RunOptions } from './services/reconciliationEngine';
import { snowflakeService } from './services/snowflakeService';
import { TableIdentifier } from './types/reconciliation';
import { EXIT_SUCCESS, InputValidationError, errorMessage, exitCodeFor } from './utils/errors';
import { createLogger } from './utils/logger';
import { displayName } from './utils/sql';

const logger = createLogger('cli');

const runOptionsSchema = z.object({
  asOf: z.string().optional(),
  ruleSet: z.enum(['pacing', 'threshold']).optional(),
  personnel: z.boolean().optional(),
  target: z.string().optional(),
  json: z.boolean().optional(),
});

type CliRunOptions = z.infer<typeof runOptionsSchema>;

export function parseTarget(value: string, config: ReconciliationConfig): TableIdentifier {
  const parts = value.split('.').map((part) => part.trim());
  if (parts.some((part) => part.length === 0)) {
    throw new InputValidationError(`Invalid target "${value}": expected [catalog.]schema.table`);
  }
  if (parts.length === 3) {
    const [catalog, schema, table] = parts;
    return { catalog, schema, table };
  }
  if (parts.length === 2) {
    const [schema, table] = parts;
    return { catalog: config.target.catalog, schema, table };
  }
  throw new InputValidationError(`Invalid target "${value}": expected [catalog.]schema.table`);
}

export function toRunOptions(raw: unknown, config: ReconciliationConfig): RunOptions {
  const parsed = runOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  const options: CliRunOptions = parsed.data;
  return {
    asOf: options.asOf,
    ruleSet: options.ruleSet,
    groupByPersonnel: options.personnel,
    target: options.target === undefined ? undefined : parseTarget(options.target, config),
  };
}

function wantsJson(raw: unknown): boolean {
  const parsed = runOptionsSchema.safeParse(raw);
  return parsed.success && parsed.data.json === true;
}

/**
 * Runs one command against a fresh engine, maps failures to exit codes and
 * always releases the warehouse connection.
 */
async function execute(command: string, body: (engine: ReconciliationEngine, config: ReconciliationConfig) => Promise<void>): Promise<void> {
  let exitCode = EXIT_SUCCESS;
  try {
    const config = loadReconciliationConfig();
    await body(new ReconciliationEngine(snowflakeService, config), config);
  } catch (error) {
    exitCode = exitCodeFor(error);
    logger.error(`${command} failed`, { error: errorMessage(error), exitCode });
    process.stderr.write(`${command} failed: ${errorMessage(error)}\n`);
  } finally {
    await snowflakeService.disconnect();
  }
  process.exitCode = exitCode;
}

const program = new Command();

program
  .name('budget-recon')
  .description('Reconcile marketing budgets against advertising spend and publish the status mart')
  .version('1.0.0');

program
  .command('run')
  .description('Discover sources, validate their schemas and replace the reconciliation mart')
  .option('--as-of <date>', 'Evaluation date (YYYY-MM-DD), defaults to today in RECON_TIMEZONE')
  .option('--rule-set <name>', 'Rule set: pacing or threshold')
  .option('--personnel', 'Keep one row per personnel within each key')
  .option('--target <name>', 'Target table as [catalog.]schema.table')
  .option('--json', 'Emit the run report as JSON')
  .action((raw: unknown) =>
    execute('run', async (engine, config) => {
      const report = await engine.run(toRunOptions(raw, config));
      if (wantsJson(raw)) {
        process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
        return;
      }
      console.log(`Replaced ${report.target} with ${report.rowCount} rows (${report.durationMs}ms)`);
      console.log(`  rule set: ${report.ruleSet}, as of ${report.asOf}`);
      console.log(`  spend tables: ${report.spendTables.length}, budget tables: ${report.budgetTables.length}`);
    })
  );

program
  .command('plan')
  .description('Print the reconciliation statement without executing it')
  .option('--as-of <date>', 'Evaluation date (YYYY-MM-DD), defaults to today in RECON_TIMEZONE')
  .option('--rule-set <name>', 'Rule set: pacing or threshold')
  .option('--personnel', 'Keep one row per personnel within each key')
  .option('--target <name>', 'Target table as [catalog.]schema.table')
  .action((raw: unknown) =>
    execute('plan', async (engine, config) => {
      const plan = await engine.plan(toRunOptions(raw, config));
      console.log(`-- target: ${displayName(plan.target)}`);
      console.log(`-- rule set: ${plan.ruleSet.name} v${plan.ruleSet.version}, as of ${plan.asOf}`);
      console.log(`-- spend tables: ${plan.tables.spend.map(displayName).join(', ') || '(none)'}`);
      console.log(`-- budget tables: ${plan.tables.budget.map(displayName).join(', ') || '(none)'}`);
      console.log(`${plan.selectSql};`);
    })
  );

program
  .command('discover')
  .description('List the source tables matched for each domain')
  .option('--json', 'Emit JSON')
  .action((raw: unknown) =>
    execute('discover', async (engine) => {
      const tables = await engine.discover();
      if (wantsJson(raw)) {
        process.stdout.write(`${JSON.stringify(tables, null, 2)}\n`);
        return;
      }
      for (const [domain, found] of Object.entries(tables)) {
        console.log(`${domain}: ${found.length} table(s)`);
        for (const table of found) {
          console.log(`  ${displayName(table)}`);
        }
      }
    })
  );

program
  .command('rule-sets')
  .description('Print the classification rule tables in evaluation order')
  .action(() => {
    for (const ruleSet of Object.values(RULE_SETS)) {
      console.log(`${ruleSet.name} v${ruleSet.version}: ${ruleSet.description}`);
      ruleSet.rules.forEach((rule, index) => {
        console.log(`  ${String(index + 1).padStart(2)}. ${rule.id} -> ${rule.label}`);
      });
      console.log(`      fallback -> ${ruleSet.fallback}`);
    }
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = exitCodeFor(error);
  });
}
