import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';
import {
  InMemoryWarehouse,
  createSnowflakeConnector,
  describeError,
  type WarehouseConnector
} from '@gridcarbon/emissions';

import { ServiceConfigError, type WarehouseSettings } from './config';

const inlineSeedSchema = z.object({
  tables: z.array(
    z.object({
      name: z.string().min(1),
      columns: z
        .array(
          z.object({
            name: z.string().min(1),
            type: z.enum(['number', 'string', 'timestamp'])
          })
        )
        .min(1),
      rows: z.array(z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]))).default([])
    })
  )
});

export type InlineSeed = z.infer<typeof inlineSeedSchema>;

/**
 * Builds the inline warehouse, populated from the seed file when one is
 * configured. Without a seed the warehouse has no tables and only answers
 * readiness checks.
 */
export const loadInlineWarehouse = async (database: string, seedFile: string | null): Promise<InMemoryWarehouse> => {
  const warehouse = new InMemoryWarehouse(database);
  if (!seedFile) {
    return warehouse;
  }

  const absolute = path.resolve(seedFile);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(absolute, 'utf8'));
  } catch (error) {
    throw new ServiceConfigError([`EMISSIONS_INLINE_SEED_FILE ${absolute} could not be read: ${describeError(error)}`]);
  }

  const parsed = inlineSeedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ServiceConfigError(
      parsed.error.issues.map(
        (issue) => `EMISSIONS_INLINE_SEED_FILE ${issue.path.join('.') || '(root)'}: ${issue.message}`
      )
    );
  }

  for (const table of parsed.data.tables) {
    warehouse.createTable(table.name, table.columns, table.rows);
  }
  return warehouse;
};

export const createWarehouseConnector = async (settings: WarehouseSettings): Promise<WarehouseConnector> => {
  if (settings.kind === 'inline') {
    const warehouse = await loadInlineWarehouse(settings.database, settings.seedFile);
    return warehouse.connector();
  }
  return createSnowflakeConnector({
    account: settings.account,
    username: settings.username,
    password: settings.password,
    database: settings.database,
    warehouse: settings.warehouse,
    role: settings.role
  });
};
