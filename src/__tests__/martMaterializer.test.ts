import { MartMaterializer, buildCreateSchemaSql, buildMaterializeSql } from '../services/martMaterializer';
import { TableIdentifier } from '../types/reconciliation';
import { MaterializationError, WarehouseError } from '../utils/errors';
import { FakeWarehouse } from './fixtures';

const TARGET: TableIdentifier = {
  catalog: 'MARKETING',
  schema: 'acme_dataset_recon_mart',
  table: 'acme_table_recon_all_all_recon_spend',
};

describe('Mart materializer', () => {
  it('renders a single replace statement with cluster keys', () => {
    expect(buildMaterializeSql(TARGET, 'SELECT 1 AS one', ['budget_group_1', 'personnel'])).toBe(
      [
        'CREATE OR REPLACE TABLE MARKETING.acme_dataset_recon_mart.acme_table_recon_all_all_recon_spend',
        'CLUSTER BY (budget_group_1, personnel)',
        'AS',
        'SELECT 1 AS one',
      ].join('\n')
    );
  });

  it('omits the cluster clause without keys', () => {
    expect(buildMaterializeSql(TARGET, 'SELECT 1 AS one', [])).toBe(
      'CREATE OR REPLACE TABLE MARKETING.acme_dataset_recon_mart.acme_table_recon_all_all_recon_spend\nAS\nSELECT 1 AS one'
    );
  });

  it('refuses unsafe cluster keys', () => {
    expect(() => buildMaterializeSql(TARGET, 'SELECT 1 AS one', ['region; DROP TABLE x'])).toThrow('Unsafe column name');
  });

  it('creates the target schema when missing', () => {
    expect(buildCreateSchemaSql({ ...TARGET, schema: 'acme-recon' })).toBe(
      'CREATE SCHEMA IF NOT EXISTS MARKETING."acme-recon"'
    );
  });

  it('replaces the table and returns its row count', async () => {
    const warehouse = new FakeWarehouse((sqlText) => (sqlText.startsWith('SELECT COUNT(*)') ? [{ ROW_COUNT: 42 }] : []));
    const materializer = new MartMaterializer(warehouse);

    await expect(materializer.materialize(TARGET, 'SELECT 1 AS one', [])).resolves.toBe(42);
    expect(warehouse.sqlTexts()).toEqual([
      'CREATE SCHEMA IF NOT EXISTS MARKETING.acme_dataset_recon_mart',
      buildMaterializeSql(TARGET, 'SELECT 1 AS one', []),
      'SELECT COUNT(*) AS row_count FROM MARKETING.acme_dataset_recon_mart.acme_table_recon_all_all_recon_spend',
    ]);
  });

  it('raises a materialization error when the statement fails', async () => {
    const warehouse = new FakeWarehouse((sqlText) =>
      sqlText.startsWith('CREATE OR REPLACE') ? new WarehouseError('Query failed: numeric value is not recognized') : []
    );
    const materializer = new MartMaterializer(warehouse);

    await expect(materializer.materialize(TARGET, 'SELECT 1 AS one', [])).rejects.toThrow(
      new MaterializationError(
        'Failed to materialize MARKETING.acme_dataset_recon_mart.acme_table_recon_all_all_recon_spend: Query failed: numeric value is not recognized'
      )
    );
    expect(warehouse.statements).toHaveLength(2);
  });
});
