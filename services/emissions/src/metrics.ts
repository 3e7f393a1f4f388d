import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface EmissionsMetrics {
  register: Registry;
  fetchDuration: Histogram<'outcome'>;
  cacheLookups: Counter<'target' | 'result'>;
  uploads: Counter<'outcome'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): EmissionsMetrics => {
  const register = new Registry();

  const fetchDuration = new Histogram({
    name: 'emissions_warehouse_fetch_duration_seconds',
    help: 'Duration of warehouse queries issued for the emissions series',
    registers: [register],
    labelNames: ['outcome'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30]
  });

  const cacheLookups = new Counter({
    name: 'emissions_cache_lookups_total',
    help: 'Query cache lookups by cached target and result',
    registers: [register],
    labelNames: ['target', 'result'] as const
  });

  const uploads = new Counter({
    name: 'emissions_uploads_total',
    help: 'Bulk uploads of aggregated tables by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const readinessGauge = new Gauge({
    name: 'emissions_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    fetchDuration,
    cacheLookups,
    uploads,
    readinessGauge
  };
};
