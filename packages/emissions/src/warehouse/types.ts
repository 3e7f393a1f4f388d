export type BindValue = string | number;

export interface WarehouseColumn {
  name: string;
}

export interface WarehouseResult {
  columns: WarehouseColumn[];
  rows: unknown[][];
}

/**
 * A single warehouse session. Statements run one at a time; session state such
 * as the current schema persists until `close()`.
 */
export interface WarehouseConnection {
  execute(sql: string, binds?: BindValue[]): Promise<WarehouseResult>;
  close(): Promise<void>;
}

export type WarehouseConnector = () => Promise<WarehouseConnection>;
