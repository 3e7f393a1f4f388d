import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parseCsv } from '../csv';
import { WarehouseConnectionError, WarehouseQueryError, describeError } from '../errors';
import type { CellValue } from '../table';
import { parseUtcInstant } from '../timeZone';
import type {
  BindValue,
  WarehouseConnection,
  WarehouseConnector,
  WarehouseResult
} from './types';

export type InMemoryColumnType = 'number' | 'string' | 'timestamp';

export interface InMemoryColumn {
  name: string;
  type: InMemoryColumnType;
}

interface StoredTable {
  columns: InMemoryColumn[];
  rows: CellValue[][];
  loadedFiles: Set<string>;
}

interface StagedFile {
  name: string;
  content: string;
}

interface SessionState {
  schema: string | null;
}

interface InjectedFailure {
  pattern: RegExp;
  message: string;
}

function parseIdentifierPath(text: string): string[] {
  const parts: string[] = [];
  const matcher = /"((?:[^"]|"")*)"|([^."\s]+)/g;
  let match: RegExpExecArray | null;
  while ((match = matcher.exec(text)) !== null) {
    const quoted = match[1];
    parts.push(quoted !== undefined ? quoted.replace(/""/g, '"').toLowerCase() : match[2].toLowerCase());
  }
  return parts;
}

function coerceField(column: InMemoryColumn, raw: string): CellValue {
  if (raw === '') {
    return null;
  }
  switch (column.type) {
    case 'number': {
      const numeric = Number(raw);
      if (!Number.isFinite(numeric)) {
        throw new Error(`Numeric value '${raw}' is not recognized for column ${column.name}`);
      }
      return numeric;
    }
    case 'timestamp': {
      const instant = parseUtcInstant(raw);
      if (instant === null) {
        throw new Error(`Timestamp '${raw}' is not recognized for column ${column.name}`);
      }
      return new Date(instant);
    }
    case 'string':
    default:
      return raw;
  }
}

function coerceSeedValue(column: InMemoryColumn, value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return column.type === 'string' ? value.toISOString() : value;
  }
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return column.type === 'string' ? String(value) : coerceField(column, String(value));
  }
  return JSON.stringify(value);
}

/**
 * Warehouse stand-in that understands the statements issued by the fetcher and
 * the bulk loader. Identifiers are case-insensitive; load metadata mirrors the
 * warehouse rule that a staged file is copied into a table once until the
 * table is truncated.
 */
export class InMemoryWarehouse {
  readonly statements: string[] = [];
  private readonly tables = new Map<string, StoredTable>();
  private readonly stages = new Map<string, StagedFile[]>();
  private readonly failures: InjectedFailure[] = [];
  private connectFailure: string | null = null;
  private open = 0;

  constructor(private readonly database = 'inline') {}

  get openConnections(): number {
    return this.open;
  }

  createTable(qualifiedName: string, columns: InMemoryColumn[], rows: Array<Record<string, unknown>> = []): void {
    const stored: StoredTable = {
      columns: columns.map((column) => ({ name: column.name.toLowerCase(), type: column.type })),
      rows: [],
      loadedFiles: new Set()
    };
    stored.rows = rows.map((row) => stored.columns.map((column) => coerceSeedValue(column, row[column.name])));
    this.tables.set(this.qualify(qualifiedName, null), stored);
  }

  hasTable(qualifiedName: string): boolean {
    return this.tables.has(this.qualify(qualifiedName, null));
  }

  getRows(qualifiedName: string): Array<Record<string, CellValue>> {
    const table = this.requireTable(this.qualify(qualifiedName, null));
    return table.rows.map((row) => {
      const record: Record<string, CellValue> = {};
      table.columns.forEach((column, index) => {
        record[column.name] = row[index];
      });
      return record;
    });
  }

  listStagedFiles(qualifiedStage: string): string[] {
    return (this.stages.get(this.qualify(qualifiedStage, null)) ?? []).map((file) => file.name);
  }

  failOn(pattern: RegExp, message = 'injected failure'): void {
    this.failures.push({ pattern, message });
  }

  failConnect(message = 'injected connection failure'): void {
    this.connectFailure = message;
  }

  clearFailures(): void {
    this.failures.length = 0;
    this.connectFailure = null;
  }

  connector(): WarehouseConnector {
    return async () => {
      if (this.connectFailure) {
        throw new WarehouseConnectionError(this.connectFailure);
      }
      this.open += 1;
      return new InMemorySession(this);
    };
  }

  release(): void {
    this.open = Math.max(0, this.open - 1);
  }

  async run(session: SessionState, sql: string): Promise<WarehouseResult> {
    const statement = sql.trim().replace(/;\s*$/, '');
    this.statements.push(statement);

    const failure = this.failures.find((entry) => entry.pattern.test(statement));
    if (failure) {
      throw new WarehouseQueryError(statement, failure.message);
    }

    try {
      return await this.dispatch(session, statement);
    } catch (error) {
      if (error instanceof WarehouseQueryError) {
        throw error;
      }
      throw new WarehouseQueryError(statement, describeError(error), { cause: error });
    }
  }

  private async dispatch(session: SessionState, statement: string): Promise<WarehouseResult> {
    let match: RegExpMatchArray | null;

    if ((match = statement.match(/^USE\s+(.+)$/i))) {
      const parts = parseIdentifierPath(match[1]);
      if (parts.length === 2) {
        if (parts[0] !== this.database.toLowerCase()) {
          throw new Error(`Database '${parts[0]}' does not exist or not authorized`);
        }
        session.schema = parts[1];
      } else if (parts.length === 1) {
        session.schema = parts[0];
      } else {
        throw new Error(`Unsupported USE target '${match[1]}'`);
      }
      return empty();
    }

    if ((match = statement.match(/^REMOVE\s+@(\S+)$/i))) {
      this.stages.delete(this.qualify(match[1], session.schema));
      return empty();
    }

    if ((match = statement.match(/^PUT\s+file:\/\/(\S+)\s+@(\S+)$/i))) {
      const content = await readFile(match[1], 'utf8');
      const stageKey = this.qualify(match[2], session.schema);
      const name = path.basename(match[1]);
      const files = (this.stages.get(stageKey) ?? []).filter((file) => file.name !== name);
      files.push({ name, content });
      this.stages.set(stageKey, files);
      return empty();
    }

    if ((match = statement.match(/^TRUNCATE\s+TABLE\s+IF\s+EXISTS\s+(\S+)$/i))) {
      const table = this.tables.get(this.qualify(match[1], session.schema));
      if (table) {
        table.rows = [];
        table.loadedFiles.clear();
      }
      return empty();
    }

    if ((match = statement.match(/^COPY\s+INTO\s+(\S+)\s+FROM\s+@(\S+)\s+FILE_FORMAT\s*=\s*\((.*)\)$/is))) {
      return this.copyInto(
        this.qualify(match[1], session.schema),
        this.qualify(match[2], session.schema),
        match[3]
      );
    }

    if ((match = statement.match(/^CREATE\s+OR\s+REPLACE\s+TABLE\s+(\S+)\s+LIKE\s+(\S+)$/i))) {
      const source = this.requireTable(this.qualify(match[2], session.schema));
      this.tables.set(this.qualify(match[1], session.schema), {
        columns: source.columns.map((column) => ({ ...column })),
        rows: [],
        loadedFiles: new Set()
      });
      return empty();
    }

    if ((match = statement.match(/^ALTER\s+TABLE\s+(\S+)\s+SWAP\s+WITH\s+(\S+)$/i))) {
      const leftKey = this.qualify(match[1], session.schema);
      const rightKey = this.qualify(match[2], session.schema);
      const left = this.requireTable(leftKey);
      const right = this.requireTable(rightKey);
      this.tables.set(leftKey, right);
      this.tables.set(rightKey, left);
      return empty();
    }

    if ((match = statement.match(/^DROP\s+TABLE\s+IF\s+EXISTS\s+(\S+)$/i))) {
      this.tables.delete(this.qualify(match[1], session.schema));
      return empty();
    }

    if ((match = statement.match(/^SELECT\s+(.+?)\s+FROM\s+(\S+)$/is))) {
      return this.select(this.qualify(match[2], session.schema), match[1]);
    }

    throw new Error(`SQL compilation error: unsupported statement '${statement}'`);
  }

  private copyInto(tableKey: string, stageKey: string, fileFormat: string): WarehouseResult {
    const table = this.requireTable(tableKey);
    const headerMatch = fileFormat.match(/skip_header\s*=\s*(\d+)/i);
    const skipHeader = headerMatch ? Number.parseInt(headerMatch[1], 10) : 0;
    const files = this.stages.get(stageKey) ?? [];
    let loaded = 0;

    const pending = files.filter((file) => !table.loadedFiles.has(file.name));
    const converted: CellValue[][] = [];
    for (const file of pending) {
      const records = parseCsv(file.content).slice(skipHeader);
      for (const record of records) {
        if (record.length !== table.columns.length) {
          throw new Error(
            `Number of columns in file (${record.length}) does not match that of the corresponding table (${table.columns.length})`
          );
        }
        converted.push(table.columns.map((column, index) => coerceField(column, record[index])));
      }
    }

    for (const file of pending) {
      table.loadedFiles.add(file.name);
    }
    for (const row of converted) {
      table.rows.push(row);
      loaded += 1;
    }
    return {
      columns: [{ name: 'ROWS_LOADED' }],
      rows: [[loaded]]
    };
  }

  private select(tableKey: string, projection: string): WarehouseResult {
    const table = this.requireTable(tableKey);
    const requested = projection.trim() === '*'
      ? table.columns.map((column) => column.name)
      : projection.split(',').map((entry) => parseIdentifierPath(entry.trim())[0] ?? '');

    const indexes = requested.map((name) => {
      const index = table.columns.findIndex((column) => column.name === name);
      if (index < 0) {
        throw new Error(`invalid identifier '${name.toUpperCase()}'`);
      }
      return index;
    });

    return {
      columns: requested.map((name) => ({ name: name.toUpperCase() })),
      rows: table.rows.map((row) => indexes.map((index) => row[index]))
    };
  }

  private requireTable(key: string): StoredTable {
    const table = this.tables.get(key);
    if (!table) {
      throw new Error(`Object '${key.toUpperCase()}' does not exist or not authorized`);
    }
    return table;
  }

  private qualify(name: string, schema: string | null): string {
    const parts = parseIdentifierPath(name);
    if (parts.length >= 2) {
      return parts.slice(-2).join('.');
    }
    if (!schema) {
      throw new Error(`Cannot resolve '${name}': this session does not have a current schema`);
    }
    return `${schema}.${parts[0] ?? ''}`;
  }
}

function empty(): WarehouseResult {
  return { columns: [{ name: 'status' }], rows: [] };
}

class InMemorySession implements WarehouseConnection {
  private readonly state: SessionState = { schema: null };
  private closed = false;

  constructor(private readonly warehouse: InMemoryWarehouse) {}

  async execute(sql: string, _binds?: BindValue[]): Promise<WarehouseResult> {
    if (this.closed) {
      throw new WarehouseConnectionError('Connection is closed');
    }
    return this.warehouse.run(this.state, sql);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.warehouse.release();
  }
}
