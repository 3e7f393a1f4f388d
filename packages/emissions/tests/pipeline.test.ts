import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  DELTA_COLUMN,
  EmissionsPipeline,
  InMemoryWarehouse,
  WarehouseQueryError,
  type AggregatedRow,
  type CacheLookup
} from '../src';

function seed(): InMemoryWarehouse {
  const warehouse = new InMemoryWarehouse();
  warehouse.createTable(
    'casestudy.average_carbon_intensity',
    [
      { name: 'emaps_carbonintensity_timestamp', type: 'string' },
      { name: 'emaps_carbonintensity_zone', type: 'string' },
      { name: 'carbon_intensity_tons_per_mwh', type: 'number' }
    ],
    [
      ['2024-01-10 10:00:00', 0.2],
      ['2024-01-20 10:00:00', 0.3],
      ['2024-02-10 10:00:00', 0.2]
    ].map(([timestamp, rate]) => ({
      emaps_carbonintensity_timestamp: timestamp,
      emaps_carbonintensity_zone: 'US-CAL-CISO',
      carbon_intensity_tons_per_mwh: rate
    }))
  );
  warehouse.createTable(
    'casestudy.marginal_operating_emissions_rate',
    [
      { name: 'moers_timestamp', type: 'string' },
      { name: 'moer_tons_per_mwh', type: 'number' },
      { name: 'watttime_balancing_authority', type: 'string' }
    ],
    [
      ['2024-01-10 11:00:00', 0.5],
      ['2024-01-20 11:00:00', 0.5],
      ['2024-02-10 11:00:00', 0.7]
    ].map(([timestamp, rate]) => ({
      moers_timestamp: timestamp,
      moer_tons_per_mwh: rate,
      watttime_balancing_authority: 'CAISO_NORTH'
    }))
  );
  return warehouse;
}

function assertClose(actual: number | null | undefined, expected: number): void {
  assert.equal(typeof actual, 'number');
  assert.ok(Math.abs(Number(actual) - expected) < 1e-9, `expected ${String(actual)} to be close to ${expected}`);
}

function valuesOf(row: AggregatedRow, column: string): number | null | undefined {
  return row.values[column];
}

test('aggregates both series by month with the per-bucket delta', async () => {
  const warehouse = seed();
  const pipeline = new EmissionsPipeline({ connector: warehouse.connector(), schema: 'casestudy', timeZone: 'UTC' });

  const aggregated = await pipeline.aggregate('month');

  assert.equal(aggregated.timeZone, 'UTC');
  assert.deepEqual(aggregated.columns, ['carbon_intensity_tons_per_mwh', 'moer_tons_per_mwh', DELTA_COLUMN]);
  assert.deepEqual(
    aggregated.rows.map((row) => [row.bucketEnd.getTime(), row.rowCount]),
    [
      [Date.parse('2024-01-31T00:00:00Z'), 4],
      [Date.parse('2024-02-29T00:00:00Z'), 2]
    ]
  );

  const [january, february] = aggregated.rows;
  assertClose(valuesOf(january, 'carbon_intensity_tons_per_mwh'), 0.25);
  assertClose(valuesOf(january, 'moer_tons_per_mwh'), 0.5);
  assertClose(valuesOf(january, DELTA_COLUMN), 0.25);
  assertClose(valuesOf(february, 'carbon_intensity_tons_per_mwh'), 0.2);
  assertClose(valuesOf(february, 'moer_tons_per_mwh'), 0.7);
  assertClose(valuesOf(february, DELTA_COLUMN), 0.5);
  assert.equal(warehouse.openConnections, 0);
});

test('reports the marginal rate spread per month', async () => {
  const pipeline = new EmissionsPipeline({ connector: seed().connector(), schema: 'casestudy', timeZone: 'UTC' });

  const spread = await pipeline.marginalSpread('month');

  assert.deepEqual(
    spread.traces.map((trace) => trace.points.map((point) => point.value)),
    [
      [0.5, 0.5, 0.5, 0.5],
      [0.7, 0.7]
    ]
  );
  assert.deepEqual(spread.mean.map((entry) => entry.bucketEnd.getTime()), [
    Date.parse('2024-01-31T00:00:00Z'),
    Date.parse('2024-02-29T00:00:00Z')
  ]);
  assertClose(spread.mean[0].value, 0.5);
  assertClose(spread.mean[1].value, 0.7);
  assert.deepEqual(spread.skipped, []);
});

test('serves repeated requests from the cache until invalidated', async () => {
  const warehouse = seed();
  const pipeline = new EmissionsPipeline({ connector: warehouse.connector(), schema: 'casestudy', timeZone: 'UTC' });

  await pipeline.aggregate('month');
  assert.equal(warehouse.statements.length, 2);

  await pipeline.aggregate('week');
  await pipeline.marginalSpread('year');
  assert.equal(warehouse.statements.length, 2);

  pipeline.invalidate();
  await pipeline.aggregate('month');
  assert.deepEqual(warehouse.statements, [
    pipeline.queries.average,
    pipeline.queries.marginal,
    pipeline.queries.average,
    pipeline.queries.marginal
  ]);
});

test('fetches again once the cache entries expire', async () => {
  const warehouse = seed();
  let clock = 1_000;
  const pipeline = new EmissionsPipeline({
    connector: warehouse.connector(),
    schema: 'casestudy',
    timeZone: 'UTC',
    cacheTtlMs: 500,
    now: () => clock
  });

  await pipeline.aligned();
  clock += 499;
  await pipeline.aligned();
  assert.equal(warehouse.statements.length, 2);

  clock += 1;
  await pipeline.aligned();
  assert.equal(warehouse.statements.length, 4);
});

test('reports cache lookups and fetch outcomes to the hooks', async () => {
  const warehouse = seed();
  const lookups: Array<[string, CacheLookup]> = [];
  const fetches: Array<[string, 'success' | 'error']> = [];
  const pipeline = new EmissionsPipeline({
    connector: warehouse.connector(),
    schema: 'casestudy',
    timeZone: 'UTC',
    hooks: {
      onCacheLookup: (target, lookup) => lookups.push([target, lookup]),
      onFetch: (sql, durationMs, outcome) => {
        assert.ok(durationMs >= 0);
        fetches.push([sql, outcome]);
      }
    }
  });

  await pipeline.aligned();
  await pipeline.aligned();

  assert.deepEqual(lookups, [
    ['aligned', 'miss'],
    ['table', 'miss'],
    ['table', 'miss'],
    ['aligned', 'hit']
  ]);
  assert.deepEqual(fetches, [
    [pipeline.queries.average, 'success'],
    [pipeline.queries.marginal, 'success']
  ]);
});

test('does not cache a failed fetch', async () => {
  const warehouse = seed();
  const outcomes: string[] = [];
  const pipeline = new EmissionsPipeline({
    connector: warehouse.connector(),
    schema: 'casestudy',
    timeZone: 'UTC',
    hooks: { onFetch: (_sql, _durationMs, outcome) => outcomes.push(outcome) }
  });
  warehouse.failOn(/marginal_operating_emissions_rate/, 'warehouse is busy');

  await assert.rejects(pipeline.aggregate('month'), WarehouseQueryError);
  assert.deepEqual(outcomes, ['success', 'error']);

  warehouse.clearFailures();
  const aggregated = await pipeline.aggregate('month');

  assert.equal(aggregated.rows.length, 2);
  assert.deepEqual(outcomes, ['success', 'error', 'success']);
  assert.equal(warehouse.statements.length, 3);
});
