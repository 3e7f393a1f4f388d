import { InMemoryWarehouse } from '@gridcarbon/emissions';

import type { ServiceConfig } from '../src/config';

export const makeConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  host: '127.0.0.1',
  port: 0,
  logLevel: 'silent',
  timeZone: 'US/Pacific',
  cacheTtlSeconds: 60,
  sourceSchema: 'casestudy',
  warehouse: { kind: 'inline', database: 'analytics', seedFile: null },
  publish: { schema: null, table: null, bucket: 'month', incremental: false },
  ...overrides
});

type SeedRow = [timestamp: string, rate: number];

const AVERAGE_ROWS: SeedRow[] = [
  ['2024-01-10 10:00:00', 0.2],
  ['2024-01-20 10:00:00', 0.3],
  ['2024-02-10 10:00:00', 0.2]
];

const MARGINAL_ROWS: SeedRow[] = [
  ['2024-01-10 11:00:00', 0.5],
  ['2024-01-20 11:00:00', 0.5],
  ['2024-02-10 11:00:00', 0.7]
];

export const seedWarehouse = (averageRows: SeedRow[] = AVERAGE_ROWS): InMemoryWarehouse => {
  const warehouse = new InMemoryWarehouse('analytics');
  warehouse.createTable(
    'casestudy.average_carbon_intensity',
    [
      { name: 'emaps_carbonintensity_timestamp', type: 'string' },
      { name: 'emaps_carbonintensity_zone', type: 'string' },
      { name: 'carbon_intensity_tons_per_mwh', type: 'number' }
    ],
    averageRows.map(([timestamp, rate]) => ({
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
    MARGINAL_ROWS.map(([timestamp, rate]) => ({
      moers_timestamp: timestamp,
      moer_tons_per_mwh: rate,
      watttime_balancing_authority: 'CAISO_NORTH'
    }))
  );
  return warehouse;
};
