import { z } from 'zod';
import { TableIdentifier, Warehouse } from '../types/reconciliation';
import { MaterializationError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { normalizeRows } from '../utils/rows';
import { assertColumnName, configIdentifier, configQualifiedName, displayName } from '../utils/sql';

const logger = createLogger('materializer');

const countRowSchema = z.object({ row_count: z.coerce.number().int().nonnegative() });

export function buildCreateSchemaSql(target: TableIdentifier): string {
  return `CREATE SCHEMA IF NOT EXISTS ${configIdentifier(target.catalog)}.${configIdentifier(target.schema)}`;
}

/**
 * Single CREATE OR REPLACE ... AS statement, so the previous contents stay in
 * place until the new table is complete.
 */
export function buildMaterializeSql(target: TableIdentifier, selectSql: string, clusterBy: readonly string[]): string {
  const cluster = clusterBy.length > 0 ? `\nCLUSTER BY (${clusterBy.map(assertColumnName).join(', ')})` : '';
  return `CREATE OR REPLACE TABLE ${configQualifiedName(target)}${cluster}\nAS\n${selectSql}`;
}

export class MartMaterializer {
  constructor(private readonly warehouse: Warehouse) {}

  /** Replace the target table with the result of `selectSql`; returns its row count. */
  async materialize(target: TableIdentifier, selectSql: string, clusterBy: readonly string[]): Promise<number> {
    const name = displayName(target);
    const startTime = Date.now();

    try {
      await this.warehouse.executeQuery(buildCreateSchemaSql(target));
      await this.warehouse.executeQuery(buildMaterializeSql(target, selectSql, clusterBy));
    } catch (error) {
      throw new MaterializationError(`Failed to materialize ${name}: ${errorMessage(error)}`, { target: name });
    }

    const result = await this.warehouse.executeQuery(
      `SELECT COUNT(*) AS row_count FROM ${configQualifiedName(target)}`
    );
    const parsed = countRowSchema.safeParse(normalizeRows(result.rows)[0]);
    if (!parsed.success) {
      throw new MaterializationError(`Could not read the row count of ${name}`, { target: name });
    }

    logger.info('Materialized reconciliation mart', {
      target: name,
      rowCount: parsed.data.row_count,
      durationMs: Date.now() - startTime,
    });
    return parsed.data.row_count;
  }
}
