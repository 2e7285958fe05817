import { describe, it, expect, afterAll } from 'vitest';
import { buildServer } from '../src/web/app.js';

const server = buildServer({ q3Policy: 'cumulative_first', roundDerived: true, port: 0 });

afterAll(async () => {
  await server.close();
});

const OCF = 'us-gaap:NetCashProvidedByUsedInOperatingActivities';

const factSet = {
  concepts: [{ concept: OCF, duration_nature: 'duration', sign_convention: 'none', decimals: '1' }],
  facts: [
    { concept: OCF, value: 29.9, start_date: '2024-01-01', end_date: '2024-03-31', doc_period_end: '2024-03-31', fiscal_year: 2024, fiscal_period: 'Q1' },
    { concept: OCF, value: 77.5, start_date: '2024-01-01', end_date: '2024-06-30', doc_period_end: '2024-06-30', fiscal_year: 2024, fiscal_period: 'Q2' },
    { concept: OCF, value: 121.2, start_date: '2024-01-01', end_date: '2024-09-30', doc_period_end: '2024-09-30', fiscal_year: 2024, fiscal_period: 'Q3' },
    { concept: OCF, value: 242.0, start_date: '2024-01-01', end_date: '2024-12-31', doc_period_end: '2024-12-31', fiscal_year: 2024, fiscal_period: 'FY' },
  ],
};

describe('GET /api/health', () => {
  it('reports the active configuration', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', q3_policy: 'cumulative_first', round_derived: true });
  });
});

describe('POST /api/reconstruct', () => {
  it('derives the missing quarters', async () => {
    const res = await server.inject({ method: 'POST', url: '/api/reconstruct', payload: { fact_set: factSet } });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.tables).toHaveLength(1);
    expect(body.tables[0].periods.Q2).toMatchObject({ value: 47.6, provenance: 'derived:6M-Q1' });
    expect(body.tables[0].periods.Q3).toMatchObject({ value: 43.7, provenance: 'derived:9M-6M' });
    expect(body.tables[0].periods.Q4).toMatchObject({ value: 120.8, provenance: 'derived:FY-9M' });
  });

  it('returns as-filed values only in raw mode', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/reconstruct',
      payload: { fact_set: factSet, mode: 'raw', periods: 'quarterly' },
    });
    const body = res.json();
    expect(body.run_mode).toBe('raw');
    expect(Object.keys(body.tables[0].periods)).toEqual(['Q1', 'Q2', 'Q3', 'Q4']);
    expect(body.tables[0].periods.Q4).toBeNull();
    expect(body.tables[0].year_to_date['9M'].value).toBe(121.2);
  });

  it('applies end-date constraints', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/reconstruct',
      payload: { fact_set: factSet, dates: ['<=2024-06-30'] },
    });
    expect(res.statusCode).toBe(200);

    const periods = res.json().tables[0].periods;
    expect(periods.Q2).toMatchObject({ value: 47.6, provenance: 'derived:6M-Q1' });
    expect(periods.Q3).toBeNull();
    expect(periods.FY).toBeNull();
  });

  it('rejects an unparsable date constraint with 400', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/reconstruct',
      payload: { fact_set: factSet, dates: ['after 2024'] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      type: 'validation',
      message: 'Invalid configuration for date: expected a constraint like ">=2024-01-01", got "after 2024"',
    });
  });

  it('rejects an invalid fact set with 422', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/reconstruct',
      payload: { fact_set: { concepts: [], facts: [{ concept: OCF }] } },
    });
    expect(res.statusCode).toBe(422);
    const body = res.json();
    expect(body.error.type).toBe('invalid_fact_set');
    expect(body.error.issues).toContain('facts.0.end_date: Required');
  });

  it('rejects unknown options with 400', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/reconstruct',
      payload: { fact_set: factSet, q3_policy: 'latest' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.type).toBe('validation');
  });

  it('keeps the 400 for malformed JSON', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/reconstruct',
      headers: { 'content-type': 'application/json' },
      payload: '{ not json',
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.type).toBe('validation');
  });
});

describe('POST /api/derivability', () => {
  it('classifies each concept', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/api/derivability',
      payload: {
        concepts: [
          { concept: 'us-gaap:WeightedAverageNumberOfDilutedSharesOutstanding', duration_nature: 'duration', sign_convention: 'none' },
          { concept: 'us-gaap:Revenues', duration_nature: 'duration', sign_convention: 'credit' },
        ],
      },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      concepts: [
        { concept: 'us-gaap:WeightedAverageNumberOfDilutedSharesOutstanding', derivability: 'copy_only', rule: 'average' },
        { concept: 'us-gaap:Revenues', derivability: 'derivable', rule: 'signed_flow' },
      ],
    });
  });
});

describe('GET /api/derivability/rules', () => {
  it('lists the rules in resolution order', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/derivability/rules' });
    const rules: Array<{ rule: string }> = res.json().rules;
    expect(rules.map(r => r.rule)).toEqual([
      'override',
      'instant',
      'average',
      'earnings_per_share',
      'signed_flow',
      'unsigned_flow',
      'unrecognized',
    ]);
  });
});

describe('GET /api/periods/classify', () => {
  it('classifies an interval', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/periods/classify?start=2024-01-01&end=2024-03-31' });
    expect(res.json()).toEqual({ start: '2024-01-01', end: '2024-03-31', days: 90, mode: 'quarter' });
  });

  it('treats a missing start as an instant', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/periods/classify?end=2024-03-31' });
    expect(res.json()).toEqual({ start: null, end: '2024-03-31', days: null, mode: 'instant' });
  });

  it('requires an end date', async () => {
    const res = await server.inject({ method: 'GET', url: '/api/periods/classify' });
    expect(res.statusCode).toBe(400);
  });
});
