import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  InMemoryWarehouse,
  WarehouseConnectionError,
  WarehouseQueryError,
  buildAverageIntensityQuery,
  buildMarginalRateQuery,
  fetchTable,
  type BindValue,
  type WarehouseConnection
} from '../src';

function seedAverageIntensity(warehouse: InMemoryWarehouse): void {
  warehouse.createTable(
    'casestudy.average_carbon_intensity',
    [
      { name: 'emaps_carbonintensity_timestamp', type: 'string' },
      { name: 'emaps_carbonintensity_zone', type: 'string' },
      { name: 'carbon_intensity_tons_per_mwh', type: 'number' }
    ],
    [
      {
        emaps_carbonintensity_timestamp: '2024-01-02 10:00:00',
        emaps_carbonintensity_zone: 'US-CAL-CISO',
        carbon_intensity_tons_per_mwh: 0.21
      },
      {
        emaps_carbonintensity_timestamp: '2024-01-01 10:00:00',
        emaps_carbonintensity_zone: 'US-CAL-CISO',
        carbon_intensity_tons_per_mwh: 0.24
      }
    ]
  );
}

test('builds the application queries with a quoted schema', () => {
  assert.equal(
    buildAverageIntensityQuery('CASESTUDY'),
    'SELECT emaps_carbonintensity_timestamp, emaps_carbonintensity_zone, carbon_intensity_tons_per_mwh FROM "CASESTUDY"."average_carbon_intensity"'
  );
  assert.equal(
    buildMarginalRateQuery('CASESTUDY'),
    'SELECT moers_timestamp, moer_tons_per_mwh, watttime_balancing_authority FROM "CASESTUDY"."marginal_operating_emissions_rate"'
  );
});

test('returns lower-cased columns and rows in warehouse order', async () => {
  const warehouse = new InMemoryWarehouse();
  seedAverageIntensity(warehouse);

  const table = await fetchTable(warehouse.connector(), buildAverageIntensityQuery('CASESTUDY'));

  assert.deepEqual(table.columns, [
    'emaps_carbonintensity_timestamp',
    'emaps_carbonintensity_zone',
    'carbon_intensity_tons_per_mwh'
  ]);
  assert.deepEqual(table.rows, [
    {
      emaps_carbonintensity_timestamp: '2024-01-02 10:00:00',
      emaps_carbonintensity_zone: 'US-CAL-CISO',
      carbon_intensity_tons_per_mwh: 0.21
    },
    {
      emaps_carbonintensity_timestamp: '2024-01-01 10:00:00',
      emaps_carbonintensity_zone: 'US-CAL-CISO',
      carbon_intensity_tons_per_mwh: 0.24
    }
  ]);
  assert.equal(warehouse.openConnections, 0);
});

test('surfaces warehouse failures as query errors carrying the SQL text', async () => {
  const warehouse = new InMemoryWarehouse();
  const sql = 'SELECT rate FROM "CASESTUDY"."missing"';

  await assert.rejects(fetchTable(warehouse.connector(), sql), (error: unknown) => {
    assert.ok(error instanceof WarehouseQueryError);
    assert.equal(error.sql, sql);
    assert.equal(error.message, "Query failed: Object 'CASESTUDY.MISSING' does not exist or not authorized");
    return true;
  });
  assert.equal(warehouse.openConnections, 0);
});

test('surfaces connection failures without retrying', async () => {
  const warehouse = new InMemoryWarehouse();
  seedAverageIntensity(warehouse);
  warehouse.failConnect('incorrect username or password');

  await assert.rejects(
    fetchTable(warehouse.connector(), buildAverageIntensityQuery('CASESTUDY')),
    (error: unknown) => error instanceof WarehouseConnectionError && error.message === 'incorrect username or password'
  );
  assert.deepEqual(warehouse.statements, []);
});

test('forwards bind values and wraps driver errors', async () => {
  const received: Array<BindValue[] | undefined> = [];
  const connection: WarehouseConnection = {
    execute: async (_sql, binds) => {
      received.push(binds);
      if (binds?.[0] === 'bad') {
        throw new Error('Numeric value is not recognized');
      }
      return { columns: [{ name: 'RATE' }], rows: [[0.5], [BigInt(2)]] };
    },
    close: async () => undefined
  };

  const table = await fetchTable(async () => connection, 'SELECT rate FROM rates WHERE zone = ?', {
    binds: ['US-CAL-CISO']
  });
  assert.deepEqual(table, { columns: ['rate'], rows: [{ rate: 0.5 }, { rate: 2 }] });

  await assert.rejects(
    fetchTable(async () => connection, 'SELECT rate FROM rates WHERE zone = ?', { binds: ['bad'] }),
    (error: unknown) =>
      error instanceof WarehouseQueryError && error.message === 'Query failed: Numeric value is not recognized'
  );
  assert.deepEqual(received, [['US-CAL-CISO'], ['bad']]);
});
