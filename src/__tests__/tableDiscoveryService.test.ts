import { loadReconciliationConfig } from '../config/reconciliation';
import { TableDiscoveryService, buildDiscoveryQuery, matchesNamingPattern } from '../services/tableDiscoveryService';
import { NamingPattern } from '../types/reconciliation';
import { DiscoveryError, WarehouseError } from '../utils/errors';
import { FakeWarehouse } from './fixtures';

const SPEND_PATTERN: NamingPattern = {
  schema: { prefix: 'acme_dataset_', suffix: '_api_mart' },
  table: { suffix: '_all_all_campaign_performance' },
};

const catalogRow = (schema: string, table: string) => ({
  TABLE_CATALOG: 'MARKETING',
  TABLE_SCHEMA: schema,
  TABLE_NAME: table,
});

describe('Table discovery', () => {
  describe('matchesNamingPattern', () => {
    it('matches every set token case-insensitively', () => {
      expect(matchesNamingPattern('ACME_dataset_meta_api_mart', { prefix: 'acme_dataset_', suffix: '_API_MART' })).toBe(true);
    });

    it('fails when any token does not match', () => {
      expect(matchesNamingPattern('acme_dataset_meta_api_mart', { prefix: 'acme_', contains: '_tiktok_' })).toBe(false);
    });

    it('matches anything when no token is set', () => {
      expect(matchesNamingPattern('whatever', {})).toBe(true);
    });
  });

  describe('buildDiscoveryQuery', () => {
    it('binds escaped LIKE patterns and excludes the marker on both names', () => {
      const { sqlText, binds } = buildDiscoveryQuery('MARKETING', SPEND_PATTERN, 'recon');

      expect(sqlText).toBe(
        [
          'SELECT TABLE_CATALOG AS table_catalog, TABLE_SCHEMA AS table_schema, TABLE_NAME AS table_name',
          'FROM MARKETING.INFORMATION_SCHEMA.TABLES',
          "WHERE TABLE_SCHEMA <> 'INFORMATION_SCHEMA'",
          "  AND TABLE_SCHEMA ILIKE ? ESCAPE '!'",
          "  AND TABLE_SCHEMA ILIKE ? ESCAPE '!'",
          "  AND TABLE_NAME ILIKE ? ESCAPE '!'",
          "  AND TABLE_SCHEMA NOT ILIKE ? ESCAPE '!'",
          "  AND TABLE_NAME NOT ILIKE ? ESCAPE '!'",
          'ORDER BY table_schema, table_name',
        ].join('\n')
      );
      expect(binds).toEqual([
        'acme!_dataset!_%',
        '%!_api!_mart',
        '%!_all!_all!_campaign!_performance',
        '%recon%',
        '%recon%',
      ]);
    });

    it('quotes a catalog name that is not a plain identifier', () => {
      const { sqlText } = buildDiscoveryQuery('marketing-prod', SPEND_PATTERN, 'recon');
      expect(sqlText).toContain('FROM "marketing-prod".INFORMATION_SCHEMA.TABLES');
    });
  });

  describe('TableDiscoveryService', () => {
    it('returns matching tables sorted, without reconciliation outputs', async () => {
      const warehouse = new FakeWarehouse(() => [
        catalogRow('acme_dataset_tiktok_api_mart', 'acme_table_tiktok_all_all_campaign_performance'),
        catalogRow('acme_dataset_meta_api_mart', 'acme_table_meta_all_all_campaign_performance'),
        catalogRow('acme_dataset_recon_api_mart', 'acme_table_recon_all_all_campaign_performance'),
        catalogRow('acme_dataset_meta_api_mart', 'acme_table_meta_daily'),
      ]);
      const service = new TableDiscoveryService(warehouse, 'MARKETING', 'recon');

      const tables = await service.discoverTables('spend', SPEND_PATTERN);

      expect(tables).toEqual([
        { catalog: 'MARKETING', schema: 'acme_dataset_meta_api_mart', table: 'acme_table_meta_all_all_campaign_performance' },
        { catalog: 'MARKETING', schema: 'acme_dataset_tiktok_api_mart', table: 'acme_table_tiktok_all_all_campaign_performance' },
      ]);
      expect(warehouse.statements).toHaveLength(1);
    });

    it('finds only the consolidated budget table under the default pattern', async () => {
      const { domains } = loadReconciliationConfig({ RECON_COMPANY: 'acme' });
      const warehouse = new FakeWarehouse(() => [
        catalogRow('acme_dataset_budget_gspread_mart', 'acme_table_budget_all_all_allocation_monthly'),
        catalogRow('acme_dataset_budget_gspread_mart', 'acme_table_budget_marketing_tet_allocation_monthly'),
        catalogRow('acme_dataset_budget_gspread_mart', 'acme_table_budget_supplier_blackfriday_allocation_monthly'),
      ]);
      const service = new TableDiscoveryService(warehouse, 'MARKETING', 'recon');

      await expect(service.discoverTables('budget', domains.budget)).resolves.toEqual([
        {
          catalog: 'MARKETING',
          schema: 'acme_dataset_budget_gspread_mart',
          table: 'acme_table_budget_all_all_allocation_monthly',
        },
      ]);
      expect(warehouse.statements[0].binds).toEqual([
        'acme!_dataset!_budget%',
        '%!_mart',
        '%!_table!_budget!_all!_all!_allocation!_monthly',
        '%recon%',
        '%recon%',
      ]);
    });

    it('returns an empty list when nothing matches', async () => {
      const service = new TableDiscoveryService(new FakeWarehouse(() => []), 'MARKETING', 'recon');
      await expect(service.discoverTables('budget', SPEND_PATTERN)).resolves.toEqual([]);
    });

    it('wraps warehouse failures', async () => {
      const warehouse = new FakeWarehouse(() => new WarehouseError('Query failed: timeout'));
      const service = new TableDiscoveryService(warehouse, 'MARKETING', 'recon');

      await expect(service.discoverTables('spend', SPEND_PATTERN)).rejects.toThrow(
        new DiscoveryError('Table discovery for spend failed: Query failed: timeout')
      );
    });

    it('rejects malformed catalog rows', async () => {
      const warehouse = new FakeWarehouse(() => [{ TABLE_SCHEMA: 'acme_dataset_meta_api_mart' }]);
      const service = new TableDiscoveryService(warehouse, 'MARKETING', 'recon');

      await expect(service.discoverTables('spend', SPEND_PATTERN)).rejects.toBeInstanceOf(DiscoveryError);
    });
  });
});
