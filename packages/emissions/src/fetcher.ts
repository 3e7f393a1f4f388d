import { EmissionsError, WarehouseQueryError, describeError } from './errors';
import { toCellValue, type Table, type TableRow } from './table';
import { withWarehouseConnection, type ConnectionScopeOptions } from './warehouse/scope';
import type { BindValue, WarehouseConnector } from './warehouse/types';

export interface FetchOptions extends ConnectionScopeOptions {
  binds?: BindValue[];
}

/**
 * Runs one query on its own connection and returns the result with lower-cased
 * column names. Rows keep the order the warehouse returned them in.
 */
export async function fetchTable(
  connector: WarehouseConnector,
  sql: string,
  options: FetchOptions = {}
): Promise<Table> {
  const result = await withWarehouseConnection(
    connector,
    async (connection) => {
      try {
        return await connection.execute(sql, options.binds);
      } catch (error) {
        if (error instanceof EmissionsError) {
          throw error;
        }
        throw new WarehouseQueryError(sql, describeError(error), { cause: error });
      }
    },
    options
  );

  const columns = result.columns.map((column) => column.name.toLowerCase());
  const rows = result.rows.map((values) => {
    const row: TableRow = {};
    columns.forEach((column, index) => {
      row[column] = toCellValue(values[index]);
    });
    return row;
  });
  return { columns, rows };
}
