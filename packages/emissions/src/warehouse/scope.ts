import { WarehouseConnectionError, describeError } from '../errors';
import type { WarehouseConnection, WarehouseConnector } from './types';

export interface ConnectionScopeOptions {
  /** Receives close failures that happen while another error is already propagating. */
  onReleaseError?: (error: unknown) => void;
}

async function acquire(connector: WarehouseConnector): Promise<WarehouseConnection> {
  try {
    return await connector();
  } catch (error) {
    if (error instanceof WarehouseConnectionError) {
      throw error;
    }
    throw new WarehouseConnectionError(`Unable to connect to warehouse: ${describeError(error)}`, {
      cause: error
    });
  }
}

/**
 * Runs `fn` against a connection that lives exactly as long as the call. The
 * connection is closed on every exit path and a close failure never replaces
 * the error thrown by `fn`.
 */
export async function withWarehouseConnection<T>(
  connector: WarehouseConnector,
  fn: (connection: WarehouseConnection) => Promise<T>,
  options: ConnectionScopeOptions = {}
): Promise<T> {
  const connection = await acquire(connector);
  let result: T;
  try {
    result = await fn(connection);
  } catch (error) {
    await connection.close().catch((closeError: unknown) => {
      options.onReleaseError?.(closeError);
    });
    throw error;
  }
  await connection.close();
  return result;
}
