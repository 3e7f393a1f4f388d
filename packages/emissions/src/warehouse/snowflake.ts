import * as snowflake from 'snowflake-sdk';

import { WarehouseConnectionError, WarehouseQueryError } from '../errors';
import type {
  BindValue,
  WarehouseConnection,
  WarehouseConnector,
  WarehouseResult
} from './types';

export interface SnowflakeSettings {
  account: string;
  username: string;
  password: string;
  database: string;
  warehouse: string;
  role?: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

class SnowflakeSession implements WarehouseConnection {
  constructor(private readonly connection: snowflake.Connection) {}

  execute(sql: string, binds?: BindValue[]): Promise<WarehouseResult> {
    return new Promise<WarehouseResult>((resolve, reject) => {
      this.connection.execute({
        sqlText: sql,
        binds,
        complete: (error, statement, rows: unknown[] | undefined) => {
          if (error) {
            reject(new WarehouseQueryError(sql, error.message, { cause: error }));
            return;
          }
          const names = (statement.getColumns() ?? []).map((column) => column.getName());
          resolve({
            columns: names.map((name) => ({ name })),
            rows: (rows ?? []).map((row) => names.map((name) => (isRecord(row) ? row[name] : undefined)))
          });
        }
      });
    });
  }

  close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.connection.destroy((error) => {
        if (error) {
          reject(new WarehouseConnectionError(`Failed to close warehouse session: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }
}

export function createSnowflakeConnector(settings: SnowflakeSettings): WarehouseConnector {
  return () =>
    new Promise<WarehouseConnection>((resolve, reject) => {
      const connection = snowflake.createConnection({
        account: settings.account,
        username: settings.username,
        password: settings.password,
        database: settings.database,
        warehouse: settings.warehouse,
        role: settings.role ?? undefined
      });
      connection.connect((error) => {
        if (error) {
          reject(
            new WarehouseConnectionError(
              `Unable to connect to Snowflake account ${settings.account}: ${error.message}`,
              { cause: error }
            )
          );
          return;
        }
        resolve(new SnowflakeSession(connection));
      });
    });
}
