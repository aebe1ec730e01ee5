import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  aggregateOffers,
  countOffers,
  isTooEarly,
  planCombinations,
} from '../../src/report/aggregator';
import type { Destination } from '../../src/config/loader';
import { fixtureKey } from '../../src/services/fixture-store';
import type { FlightSearchClient } from '../../src/services/serpapi-client';
import { ConfigurationError, FixtureNotFoundError, TransportError } from '../../src/types/errors';
import type { RawOfferGroup } from '../../src/utils/flight-normalizer';

const JAPAN: Destination = { name: 'Japan (Tokyo)', code: 'NRT', flag: 'JP' };
const TAIWAN: Destination = { name: 'Taiwan', code: 'TPE', flag: 'TW' };

const CONFIG = {
  origin: 'YYZ',
  destinations: [JAPAN, TAIWAN],
  adults: 1,
  currency: 'CAD',
  cutoff: null,
};

/** Answers by fixture key; unknown keys return no offers. */
class FakeSearchClient implements FlightSearchClient {
  readonly calls: string[] = [];
  private readonly responses: Record<string, RawOfferGroup[] | Error>;

  constructor(responses: Record<string, RawOfferGroup[] | Error> = {}) {
    this.responses = responses;
  }

  async search(origin: string, destination: string, departureDate: string, returnDate?: string) {
    const key = fixtureKey(origin, destination, departureDate, returnDate);
    this.calls.push(key);
    const response = this.responses[key];
    if (response instanceof Error) throw response;
    return response ?? [];
  }
}

function group(from: string, to: string, departs: string, price: number, airline = 'Air Canada'): RawOfferGroup {
  return {
    flights: [
      {
        departure_airport: { id: from, time: departs },
        arrival_airport: { id: to, time: '2026-10-24 15:30' },
        airline,
      },
    ],
    layovers: [],
    total_duration: 780,
    price,
    _book_url: '',
  };
}

describe('isTooEarly', () => {
  const cutoff = { date: '2026-10-23', time: '19:00' };

  it('keeps everything without a cutoff', () => {
    expect(isTooEarly({ departureDate: '2026-10-23', departureTime: '06:00' }, null)).toBe(false);
  });

  it('only applies on the cutoff date', () => {
    expect(isTooEarly({ departureDate: '2026-10-24', departureTime: '06:00' }, cutoff)).toBe(false);
  });

  it('drops departures strictly before the cutoff time', () => {
    expect(isTooEarly({ departureDate: '2026-10-23', departureTime: '18:59' }, cutoff)).toBe(true);
    expect(isTooEarly({ departureDate: '2026-10-23', departureTime: '00:00' }, cutoff)).toBe(true);
  });

  it('keeps departures at or after the cutoff time', () => {
    expect(isTooEarly({ departureDate: '2026-10-23', departureTime: '19:00' }, cutoff)).toBe(false);
    expect(isTooEarly({ departureDate: '2026-10-23', departureTime: '21:30' }, cutoff)).toBe(false);
  });
});

describe('planCombinations', () => {
  it('plans outbound, return, then round trips with a later return date', () => {
    const plan = planCombinations(
      'YYZ',
      JAPAN,
      ['2026-10-23', '2026-10-24'],
      ['2026-10-24', '2026-11-05'],
      ['outbound', 'return', 'roundtrip']
    );

    expect(plan.map((c) => [c.tripType, c.from, c.to, c.departureDate, c.returnDate])).toEqual([
      ['outbound', 'YYZ', 'NRT', '2026-10-23', undefined],
      ['outbound', 'YYZ', 'NRT', '2026-10-24', undefined],
      ['return', 'NRT', 'YYZ', '2026-10-24', undefined],
      ['return', 'NRT', 'YYZ', '2026-11-05', undefined],
      ['roundtrip', 'YYZ', 'NRT', '2026-10-23', '2026-10-24'],
      ['roundtrip', 'YYZ', 'NRT', '2026-10-23', '2026-11-05'],
      ['roundtrip', 'YYZ', 'NRT', '2026-10-24', '2026-11-05'],
    ]);
  });

  it('skips round trips whose return is not after departure', () => {
    const plan = planCombinations('YYZ', JAPAN, ['2026-11-05'], ['2026-11-01', '2026-11-05'], ['roundtrip']);
    expect(plan).toEqual([]);
  });

  it('plans only the requested trip types', () => {
    const plan = planCombinations('YYZ', JAPAN, ['2026-10-23'], ['2026-11-05'], ['return']);
    expect(plan.map((c) => c.tripType)).toEqual(['return']);
  });
});

describe('aggregateOffers', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('searches destination by destination, date by date', async () => {
    const client = new FakeSearchClient();
    await aggregateOffers(client, CONFIG, ['2026-10-23', '2026-10-24'], [], ['outbound']);
    expect(client.calls).toEqual([
      'YYZ_NRT_2026-10-23',
      'YYZ_NRT_2026-10-24',
      'YYZ_TPE_2026-10-23',
      'YYZ_TPE_2026-10-24',
    ]);
  });

  it('never queries a round trip returning before it departs', async () => {
    const client = new FakeSearchClient();
    await aggregateOffers(
      client,
      { ...CONFIG, destinations: [JAPAN] },
      ['2026-10-23'],
      ['2026-10-20', '2026-10-23'],
      ['roundtrip']
    );
    expect(client.calls).toEqual([]);
  });

  it('collects offers per trip type and destination in discovery order', async () => {
    const client = new FakeSearchClient({
      'YYZ_NRT_2026-10-23': [group('YYZ', 'NRT', '2026-10-23 20:15', 1450), group('YYZ', 'NRT', '2026-10-23 13:00', 1800)],
      'TPE_YYZ_2026-11-05': [group('TPE', 'YYZ', '2026-11-05 23:40', 990, 'EVA Air')],
      'YYZ_TPE_2026-10-23_ret_2026-11-05': [group('YYZ', 'TPE', '2026-10-23 01:15', 2100, 'EVA Air')],
    });

    const aggregate = await aggregateOffers(
      client,
      CONFIG,
      ['2026-10-23'],
      ['2026-11-05'],
      ['outbound', 'return', 'roundtrip']
    );

    expect(aggregate.get('outbound')?.get('Japan (Tokyo)')?.map((o) => o.price)).toEqual([1450, 1800]);
    expect(aggregate.get('outbound')?.get('Taiwan')).toEqual([]);
    expect(aggregate.get('return')?.get('Taiwan')?.map((o) => [o.tripType, o.airline, o.departureDate])).toEqual([
      ['return', 'EVA Air', '2026-11-05'],
    ]);
    expect(aggregate.get('roundtrip')?.get('Taiwan')?.map((o) => [o.price, o.returnDate])).toEqual([[2100, '2026-11-05']]);
    expect(countOffers(aggregate)).toBe(4);
  });

  it('initializes every trip type and destination even without offers', async () => {
    const aggregate = await aggregateOffers(new FakeSearchClient(), CONFIG, ['2026-10-23'], [], ['outbound']);
    expect([...aggregate.keys()]).toEqual(['outbound']);
    expect([...(aggregate.get('outbound')?.keys() ?? [])]).toEqual(['Japan (Tokyo)', 'Taiwan']);
    expect(countOffers(aggregate)).toBe(0);
  });

  it('applies the cutoff to outbound legs but not return legs', async () => {
    const client = new FakeSearchClient({
      'YYZ_NRT_2026-10-23': [group('YYZ', 'NRT', '2026-10-23 18:59', 1000), group('YYZ', 'NRT', '2026-10-23 19:00', 1100)],
      'NRT_YYZ_2026-10-23': [group('NRT', 'YYZ', '2026-10-23 08:00', 900)],
    });

    const aggregate = await aggregateOffers(
      client,
      { ...CONFIG, destinations: [JAPAN], cutoff: { date: '2026-10-23', time: '19:00' } },
      ['2026-10-23'],
      ['2026-10-23'],
      ['outbound', 'return']
    );

    expect(aggregate.get('outbound')?.get('Japan (Tokyo)')?.map((o) => o.departureTime)).toEqual(['19:00']);
    expect(aggregate.get('return')?.get('Japan (Tokyo)')?.map((o) => o.departureTime)).toEqual(['08:00']);
  });

  it('logs a failed combination and carries on', async () => {
    const client = new FakeSearchClient({
      'YYZ_NRT_2026-10-23': new TransportError('SerpApi returned HTTP 503 for YYZ->NRT 2026-10-23', 503),
      'YYZ_TPE_2026-10-23': [group('YYZ', 'TPE', '2026-10-23 11:00', 1200)],
    });

    const aggregate = await aggregateOffers(client, CONFIG, ['2026-10-23'], [], ['outbound']);

    expect(aggregate.get('outbound')?.get('Japan (Tokyo)')).toEqual([]);
    expect(aggregate.get('outbound')?.get('Taiwan')?.length).toBe(1);
    expect(console.error).toHaveBeenCalledWith('    Warning: SerpApi returned HTTP 503 for YYZ->NRT 2026-10-23');
  });

  it('stops on a missing fixture', async () => {
    const client = new FakeSearchClient({
      'YYZ_NRT_2026-10-23': new FixtureNotFoundError('/tmp/fixtures/YYZ_NRT_2026-10-23.json'),
    });

    await expect(aggregateOffers(client, CONFIG, ['2026-10-23'], [], ['outbound'])).rejects.toBeInstanceOf(
      FixtureNotFoundError
    );
    expect(client.calls).toEqual(['YYZ_NRT_2026-10-23']);
  });

  it('stops on a configuration error', async () => {
    const client = new FakeSearchClient({
      'YYZ_NRT_2026-10-23': new ConfigurationError('SERPAPI_KEY must be set. Register free at https://serpapi.com'),
    });

    await expect(aggregateOffers(client, CONFIG, ['2026-10-23'], [], ['outbound'])).rejects.toThrow(
      'SERPAPI_KEY must be set'
    );
  });

  it('logs each combination before searching it', async () => {
    await aggregateOffers(
      new FakeSearchClient(),
      { ...CONFIG, destinations: [JAPAN] },
      ['2026-10-23'],
      ['2026-11-05'],
      ['outbound', 'return', 'roundtrip']
    );
    expect(vi.mocked(console.error).mock.calls.map((args) => args[0])).toEqual([
      '  [outbound]  YYZ -> NRT  on  2026-10-23',
      '  [return]    NRT -> YYZ  on  2026-11-05',
      '  [roundtrip] YYZ <-> NRT  2026-10-23 / 2026-11-05',
    ]);
  });
});
