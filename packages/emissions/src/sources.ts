import { quoteIdentifier } from './sql';

export interface SeriesSource {
  table: string;
  timestampColumn: string;
  keyColumn: string;
  rateColumn: string;
}

export const AVERAGE_CARBON_INTENSITY: SeriesSource = {
  table: 'average_carbon_intensity',
  timestampColumn: 'emaps_carbonintensity_timestamp',
  keyColumn: 'emaps_carbonintensity_zone',
  rateColumn: 'carbon_intensity_tons_per_mwh'
};

export const MARGINAL_OPERATING_EMISSIONS_RATE: SeriesSource = {
  table: 'marginal_operating_emissions_rate',
  timestampColumn: 'moers_timestamp',
  keyColumn: 'watttime_balancing_authority',
  rateColumn: 'moer_tons_per_mwh'
};

export const DELTA_COLUMN = 'delta_marginal_vs_average_tons_per_mwh';

export const DEFAULT_TIME_ZONE = 'US/Pacific';

export function buildAverageIntensityQuery(schema: string): string {
  const { timestampColumn, keyColumn, rateColumn, table } = AVERAGE_CARBON_INTENSITY;
  return `SELECT ${timestampColumn}, ${keyColumn}, ${rateColumn} FROM ${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

export function buildMarginalRateQuery(schema: string): string {
  const { timestampColumn, keyColumn, rateColumn, table } = MARGINAL_OPERATING_EMISSIONS_RATE;
  return `SELECT ${timestampColumn}, ${rateColumn}, ${keyColumn} FROM ${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}
