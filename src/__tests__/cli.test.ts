import { parseTarget, toRunOptions } from '../cli';
import { loadReconciliationConfig } from '../config/reconciliation';
import { InputValidationError } from '../utils/errors';

const config = loadReconciliationConfig({ RECON_COMPANY: 'acme', SNOWFLAKE_DATABASE: 'MARKETING' });

describe('CLI options', () => {
  describe('parseTarget', () => {
    it('takes the catalog from configuration when omitted', () => {
      expect(parseTarget('recon.preview', config)).toEqual({ catalog: 'MARKETING', schema: 'recon', table: 'preview' });
      expect(parseTarget('SANDBOX.recon.preview', config)).toEqual({
        catalog: 'SANDBOX',
        schema: 'recon',
        table: 'preview',
      });
    });

    it('rejects malformed names', () => {
      expect(() => parseTarget('preview', config)).toThrow(InputValidationError);
      expect(() => parseTarget('recon..preview', config)).toThrow('Invalid target "recon..preview"');
      expect(() => parseTarget('a.b.c.d', config)).toThrow(InputValidationError);
    });
  });

  describe('toRunOptions', () => {
    it('maps command flags to run options', () => {
      expect(
        toRunOptions({ asOf: '2024-06-15', ruleSet: 'threshold', personnel: true, target: 'recon.preview' }, config)
      ).toEqual({
        asOf: '2024-06-15',
        ruleSet: 'threshold',
        groupByPersonnel: true,
        target: { catalog: 'MARKETING', schema: 'recon', table: 'preview' },
      });
    });

    it('leaves unset flags to the configuration', () => {
      expect(toRunOptions({}, config)).toEqual({});
    });

    it('rejects unknown rule sets', () => {
      expect(() => toRunOptions({ ruleSet: 'fastest' }, config)).toThrow(InputValidationError);
    });
  });
});
