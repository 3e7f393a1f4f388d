import { aggregateByBucket, marginalSpread, type AggregatedTable, type MarginalSpread } from './aggregator';
import { alignSeries } from './aligner';
import type { Bucket } from './buckets';
import { QueryCache, type CacheLookup } from './cache';
import { fetchTable } from './fetcher';
import {
  AVERAGE_CARBON_INTENSITY,
  DEFAULT_TIME_ZONE,
  MARGINAL_OPERATING_EMISSIONS_RATE,
  buildAverageIntensityQuery,
  buildMarginalRateQuery
} from './sources';
import type { AlignedTable, Table } from './table';
import type { WarehouseConnector } from './warehouse/types';

export interface PipelineHooks {
  onCacheLookup?: (target: string, lookup: CacheLookup) => void;
  onFetch?: (sql: string, durationMs: number, outcome: 'success' | 'error') => void;
  onReleaseError?: (error: unknown) => void;
}

export interface EmissionsPipelineOptions {
  connector: WarehouseConnector;
  schema: string;
  timeZone?: string;
  cacheTtlMs?: number;
  now?: () => number;
  hooks?: PipelineHooks;
}

/**
 * Fetch, align and aggregate for the average intensity and marginal rate
 * series. Fetched and aligned tables are cached per query for the cache TTL.
 */
export class EmissionsPipeline {
  private readonly tables: QueryCache<Table>;
  private readonly alignedCache: QueryCache<AlignedTable>;
  private readonly averageQuery: string;
  private readonly marginalQuery: string;
  readonly timeZone: string;

  constructor(private readonly options: EmissionsPipelineOptions) {
    const cacheOptions = { ttlMs: options.cacheTtlMs, now: options.now };
    this.tables = new QueryCache<Table>(cacheOptions);
    this.alignedCache = new QueryCache<AlignedTable>(cacheOptions);
    this.averageQuery = buildAverageIntensityQuery(options.schema);
    this.marginalQuery = buildMarginalRateQuery(options.schema);
    this.timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  }

  get queries(): { average: string; marginal: string } {
    return { average: this.averageQuery, marginal: this.marginalQuery };
  }

  async aligned(): Promise<AlignedTable> {
    const key = `${this.averageQuery}\n${this.marginalQuery}`;
    return this.alignedCache.getOrLoad(
      key,
      async () => {
        const average = await this.load(this.averageQuery);
        const marginal = await this.load(this.marginalQuery);
        return alignSeries(average, marginal, {
          timeZone: this.timeZone,
          timestampColumns: [
            AVERAGE_CARBON_INTENSITY.timestampColumn,
            MARGINAL_OPERATING_EMISSIONS_RATE.timestampColumn
          ]
        });
      },
      { timeZone: this.timeZone },
      (lookup) => this.options.hooks?.onCacheLookup?.('aligned', lookup)
    );
  }

  async aggregate(bucket: Bucket): Promise<AggregatedTable> {
    return aggregateByBucket(await this.aligned(), bucket);
  }

  async marginalSpread(bucket: Bucket): Promise<MarginalSpread> {
    return marginalSpread(await this.aligned(), bucket);
  }

  invalidate(): void {
    this.tables.clear();
    this.alignedCache.clear();
  }

  private load(sql: string): Promise<Table> {
    const { hooks, connector } = this.options;
    return this.tables.getOrLoad(
      sql,
      async () => {
        const started = Date.now();
        try {
          const table = await fetchTable(connector, sql, { onReleaseError: hooks?.onReleaseError });
          hooks?.onFetch?.(sql, Date.now() - started, 'success');
          return table;
        } catch (error) {
          hooks?.onFetch?.(sql, Date.now() - started, 'error');
          throw error;
        }
      },
      undefined,
      (lookup) => hooks?.onCacheLookup?.('table', lookup)
    );
  }
}
