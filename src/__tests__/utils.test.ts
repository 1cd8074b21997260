import { isIsoDate, isValidTimeZone, toEpochDay, todayInTimeZone } from '../utils/dates';
import {
  ConfigurationError,
  DiscoveryError,
  EXIT_EXTERNAL,
  EXIT_UNEXPECTED,
  EXIT_VALIDATION,
  InputValidationError,
  MaterializationError,
  RunInProgressError,
  SchemaMismatchError,
  WarehouseError,
  errorMessage,
  exitCodeFor,
} from '../utils/errors';
import { normalizeRow } from '../utils/rows';

describe('dates', () => {
  it('accepts only real calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-6-1')).toBe(false);
    expect(isIsoDate('2024-06-01T00:00:00Z')).toBe(false);
  });

  it('counts whole days between dates', () => {
    expect(toEpochDay('1970-01-02')).toBe(1);
    expect(toEpochDay('2024-03-01') - toEpochDay('2024-02-28')).toBe(2);
  });

  it('names the field of an invalid date', () => {
    expect(() => toEpochDay('2024-13-01', 'start_date')).toThrow(
      new InputValidationError('Invalid start_date "2024-13-01": expected a YYYY-MM-DD calendar date')
    );
  });

  it('resolves today in a time zone', () => {
    const now = new Date('2024-12-31T23:30:00Z');
    expect(todayInTimeZone('UTC', now)).toBe('2024-12-31');
    expect(todayInTimeZone('Asia/Ho_Chi_Minh', now)).toBe('2025-01-01');
  });

  it('validates time zone names', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Base')).toBe(false);
  });
});

describe('errors', () => {
  it('maps failures to exit codes', () => {
    expect(exitCodeFor(new ConfigurationError('bad'))).toBe(EXIT_VALIDATION);
    expect(exitCodeFor(new InputValidationError('bad'))).toBe(EXIT_VALIDATION);
    expect(exitCodeFor(new SchemaMismatchError('bad'))).toBe(EXIT_VALIDATION);
    expect(exitCodeFor(new DiscoveryError('down'))).toBe(EXIT_EXTERNAL);
    expect(exitCodeFor(new MaterializationError('down'))).toBe(EXIT_EXTERNAL);
    expect(exitCodeFor(new WarehouseError('down'))).toBe(EXIT_EXTERNAL);
    expect(exitCodeFor(new TypeError('bug'))).toBe(EXIT_UNEXPECTED);
  });

  it('carries HTTP status and code', () => {
    const error = new RunInProgressError('2024-06-15T03:00:00.000Z');
    expect(error.statusCode).toBe(409);
    expect(error.code).toBe('RUN_IN_PROGRESS');
    expect(error.message).toBe('A reconciliation run started at 2024-06-15T03:00:00.000Z is still in progress');
    expect(error.details).toEqual({ startedAt: '2024-06-15T03:00:00.000Z' });

    const invalid = new InputValidationError('bad date');
    expect(invalid.name).toBe('ValidationError');
    expect(invalid.statusCode).toBe(400);
  });

  it('extracts messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('rows', () => {
  it('lower-cases keys and renders driver dates as ISO strings', () => {
    expect(
      normalizeRow({
        REGION: 'north',
        START_DATE: new Date('2024-06-01T00:00:00Z'),
        LOADED_AT: new Date('2024-06-01T08:30:00Z'),
        SPEND: 12.5,
        ACTIVE: null,
      })
    ).toEqual({
      region: 'north',
      start_date: '2024-06-01',
      loaded_at: '2024-06-01T08:30:00.000Z',
      spend: 12.5,
      active: null,
    });
  });
});
