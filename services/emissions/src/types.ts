import type { EmissionsPipeline, WarehouseConnector } from '@gridcarbon/emissions';

import type { ServiceConfig } from './config';
import type { EmissionsMetrics } from './metrics';

export interface ReadinessState {
  warehouse: boolean;
}

export interface AppContext {
  config: ServiceConfig;
  connector: WarehouseConnector;
  pipeline: EmissionsPipeline;
  metrics: EmissionsMetrics;
  readiness: ReadinessState;
}
