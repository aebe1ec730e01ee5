import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  getProjectRoot,
  loadConfig,
  loadDestinationDefaults,
  parseDestinationList,
  resolveTripTypes,
  type Env,
} from '../../src/config/loader';
import { ConfigurationError } from '../../src/types/errors';
import { validateIsoDate, validatePositiveInt, validateTime } from '../../src/types/validation';

const NOW = new Date(2026, 9, 19, 8, 0);

function load(env: Env) {
  return loadConfig(env, { now: NOW });
}

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = load({});

    expect(config.reportDate).toBe('2026-10-19');
    expect(config.origin).toBe('YYZ');
    expect(config.adults).toBe(1);
    expect(config.currency).toBe('CAD');
    expect(config.regionLabel).toBe('Asia');
    expect(config.cutoff).toBeNull();
    expect(config.search).toEqual({
      apiKey: null,
      mockMode: false,
      saveFixtures: false,
      fixturesDir: path.join(getProjectRoot(), 'fixtures'),
      timeoutMs: 30000,
      maxResults: 5,
    });
    expect(config.smtp).toEqual({
      host: undefined,
      port: 587,
      user: undefined,
      pass: undefined,
      from: undefined,
      to: [],
    });
  });

  it('reads the default destinations with per-destination overrides', () => {
    const config = load({ DEST_OSAKA: ' ITM ' });
    expect(config.destinations).toEqual([
      { name: 'Japan (Tokyo)', code: 'NRT', flag: 'JP' },
      { name: 'Japan (Osaka)', code: 'ITM', flag: 'JP' },
      { name: 'Taiwan', code: 'TPE', flag: 'TW' },
    ]);
  });

  it('replaces the destination list from DESTINATIONS', () => {
    const config = load({ DESTINATIONS: 'Seoul=ICN, Bangkok=BKK' });
    expect(config.destinations).toEqual([
      { name: 'Seoul', code: 'ICN', flag: '' },
      { name: 'Bangkok', code: 'BKK', flag: '' },
    ]);
  });

  it('takes explicit departure dates, trimming whitespace', () => {
    const config = load({ DEPARTURE_DATES: ' 2026-10-23 , 2026-10-24 ' });
    expect(config.departureDates).toEqual(['2026-10-23', '2026-10-24']);
  });

  it('prefers explicit departure dates over DAYS_AHEAD', () => {
    const config = load({ DEPARTURE_DATES: '2026-10-23', DAYS_AHEAD: '7' });
    expect(config.departureDates).toEqual(['2026-10-23']);
  });

  it('keeps an explicit departure list that names no dates', () => {
    expect(load({ DEPARTURE_DATES: ',', DAYS_AHEAD: '7' }).departureDates).toEqual([]);
  });

  it('derives departure dates from today by default', () => {
    expect(load({}).departureDates).toEqual(['2026-11-18', '2026-12-18', '2027-01-17']);
  });

  it('derives departure dates from DAYS_AHEAD', () => {
    expect(load({ DAYS_AHEAD: '1,7' }).departureDates).toEqual(['2026-10-20', '2026-10-26']);
  });

  it('reads return dates', () => {
    expect(load({ RETURN_DATES: '2026-11-05,2026-11-06' }).returnDates).toEqual(['2026-11-05', '2026-11-06']);
    expect(load({ RETURN_DATES: '' }).returnDates).toEqual([]);
  });

  it('searches outbound only when no return dates are configured', () => {
    expect(load({ TRIP_TYPES: 'return,roundtrip' }).tripTypes).toEqual(['outbound']);
  });

  it('drops unknown trip types', () => {
    const config = load({ TRIP_TYPES: 'outbound,invalid,roundtrip', RETURN_DATES: '2026-11-05' });
    expect(config.tripTypes).toEqual(['outbound', 'roundtrip']);
  });

  it('keeps every trip type by default when return dates exist', () => {
    expect(load({ RETURN_DATES: '2026-11-05' }).tripTypes).toEqual(['outbound', 'return', 'roundtrip']);
  });

  it('sets the departure cutoff only when date and time are both given', () => {
    expect(load({ EARLIEST_DEP_DATE: '2026-10-23', EARLIEST_DEP_TIME: '7:05' }).cutoff).toEqual({
      date: '2026-10-23',
      time: '07:05',
    });
    expect(load({ EARLIEST_DEP_TIME: '19:00' }).cutoff).toBeNull();
  });

  it('parses mode flags', () => {
    const config = load({ MOCK_MODE: 'TRUE', SAVE_FIXTURES: 'no', SERPAPI_KEY: 'test-secret' });
    expect(config.search.mockMode).toBe(true);
    expect(config.search.saveFixtures).toBe(false);
    expect(config.search.apiKey).toBe('test-secret');
  });

  it('resolves FIXTURES_DIR against the working directory', () => {
    expect(load({ FIXTURES_DIR: 'tmp/replay' }).search.fixturesDir).toBe(path.resolve(process.cwd(), 'tmp/replay'));
  });

  it('splits EMAIL_TO into recipients', () => {
    const config = load({ EMAIL_TO: 'a@example.com, b@example.com , c@example.com' });
    expect(config.smtp.to).toEqual(['a@example.com', 'b@example.com', 'c@example.com']);
  });

  it('sends from and to the SMTP user by default', () => {
    const config = load({ SMTP_USER: 'reports@example.com', SMTP_PORT: '465' });
    expect(config.smtp.from).toBe('reports@example.com');
    expect(config.smtp.to).toEqual(['reports@example.com']);
    expect(config.smtp.port).toBe(465);
  });

  it('rejects an impossible date', () => {
    expect(() => load({ DEPARTURE_DATES: '2026-02-30' })).toThrow(
      new ConfigurationError('DEPARTURE_DATES is not a valid date: "2026-02-30"')
    );
  });

  it('collects every invalid value into one error', () => {
    try {
      load({ ADULTS: '0', MAX_RESULTS: 'five' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (!(e instanceof ConfigurationError)) return;
      expect(e.issues).toEqual(['ADULTS must be positive (got: 0)', 'MAX_RESULTS must be a whole number (got: "five")']);
      expect(e.message).toBe(
        'Invalid configuration:\n' +
          '  - ADULTS must be positive (got: 0)\n' +
          '  - MAX_RESULTS must be a whole number (got: "five")'
      );
    }
  });

  it('rejects a malformed DESTINATIONS entry', () => {
    expect(() => load({ DESTINATIONS: 'Seoul' })).toThrow('DESTINATIONS entries must look like "Name=CODE" (got: "Seoul")');
  });
});

describe('parseDestinationList', () => {
  it('splits on the last equals sign', () => {
    expect(parseDestinationList('A=B=C')).toEqual({ ok: true, value: [{ name: 'A=B', code: 'C', flag: '' }] });
  });

  it('rejects an empty list', () => {
    expect(parseDestinationList(' , ')).toEqual({ ok: false, error: 'DESTINATIONS must name at least one destination' });
  });
});

describe('resolveTripTypes', () => {
  it('removes duplicates in first-seen order', () => {
    expect(resolveTripTypes(['roundtrip', 'outbound', 'roundtrip'], ['2026-11-05'])).toEqual(['roundtrip', 'outbound']);
  });

  it('falls back to outbound when nothing usable was requested', () => {
    expect(resolveTripTypes([], ['2026-11-05'])).toEqual(['outbound']);
  });
});

describe('loadDestinationDefaults', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it('reports a missing file', () => {
    const missing = path.join(os.tmpdir(), 'no-such-dir', 'destinations.json');
    expect(() => loadDestinationDefaults(missing)).toThrow(`Destinations config not found: ${missing}`);
  });

  it('rejects a file without destinations', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flight-report-config-'));
    const file = path.join(tmpDir, 'destinations.json');
    fs.writeFileSync(file, JSON.stringify({ version: '1.0.0', destinations: [] }));
    expect(() => loadDestinationDefaults(file)).toThrow(ConfigurationError);
  });

  it('rejects invalid JSON', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flight-report-config-'));
    const file = path.join(tmpDir, 'destinations.json');
    fs.writeFileSync(file, '{ not json');
    expect(() => loadDestinationDefaults(file)).toThrow(ConfigurationError);
  });
});

describe('validation helpers', () => {
  it('validates ISO dates', () => {
    expect(validateIsoDate('2028-02-29', 'd')).toEqual({ ok: true, value: '2028-02-29' });
    expect(validateIsoDate('2026/10/23', 'd')).toEqual({
      ok: false,
      error: 'd must be YYYY-MM-DD format (got: "2026/10/23")',
    });
  });

  it('validates positive integers', () => {
    expect(validatePositiveInt('12', 'n')).toEqual({ ok: true, value: 12 });
    expect(validatePositiveInt('-3', 'n')).toEqual({ ok: false, error: 'n must be a whole number (got: "-3")' });
  });

  it('pads clock times', () => {
    expect(validateTime('9:30', 't')).toEqual({ ok: true, value: '09:30' });
    expect(validateTime('24:00', 't')).toEqual({ ok: false, error: 't must be HH:MM format (got: "24:00")' });
  });
});
