import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { type DatabaseData, type Filters, type Row, type TableName } from "./models.js";

/**
 * Row store used by every service. Filters are equality matches on row fields,
 * combined with AND, mirroring `.eq()` chaining on a query builder.
 */
export interface Database {
  getAll<T extends TableName>(table: T, filters?: Filters<T>, options?: ListOptions<T>): Promise<Array<Row<T>>>;
  getById<T extends TableName>(table: T, id: string): Promise<Row<T> | null>;
  findOne<T extends TableName>(table: T, filters: Filters<T>): Promise<Row<T> | null>;
  create<T extends TableName>(table: T, row: Row<T>): Promise<Row<T>>;
  /** Inserts unless a row already matches `unique`; returns null on conflict. */
  createUnique<T extends TableName>(table: T, row: Row<T>, unique: Filters<T>): Promise<Row<T> | null>;
  updateById<T extends TableName>(table: T, id: string, patch: Partial<Row<T>>): Promise<Row<T> | null>;
  updateWhere<T extends TableName>(table: T, filters: Filters<T>, patch: Partial<Row<T>>): Promise<number>;
  deleteById<T extends TableName>(table: T, id: string): Promise<boolean>;
  newId(): string;
  nowIso(): string;
}

export interface ListOptions<T extends TableName> {
  limit?: number;
  /** Rows are sorted on this field before the limit applies. */
  orderBy?: keyof Row<T> & string;
  ascending?: boolean;
}

export const DEFAULT_LIMIT = 100;

function emptyData(): DatabaseData {
  return {
    profiles: [],
    subscriptions: [],
    campaigns: [],
    usage_events: [],
    download_logs: [],
    webhook_events: [],
    two_factor_logs: [],
  };
}

function normalizeParsedData(parsed: Partial<DatabaseData> | null | undefined): DatabaseData {
  return {
    profiles: parsed?.profiles ?? [],
    subscriptions: parsed?.subscriptions ?? [],
    campaigns: parsed?.campaigns ?? [],
    usage_events: parsed?.usage_events ?? [],
    download_logs: parsed?.download_logs ?? [],
    webhook_events: parsed?.webhook_events ?? [],
    two_factor_logs: parsed?.two_factor_logs ?? [],
  };
}

export function matchesFilters(row: object, filters: object | undefined): boolean {
  if (!filters) {
    return true;
  }

  for (const [key, expected] of Object.entries(filters)) {
    if (expected === undefined) {
      continue;
    }
    if (Reflect.get(row, key) !== expected) {
      return false;
    }
  }

  return true;
}

/** Orders on one field, nulls last, like `.order(column, { ascending })`. */
export function compareOn(field: string, ascending = true): (left: object, right: object) => number {
  const direction = ascending ? 1 : -1;
  return (left, right) => {
    const a: unknown = Reflect.get(left, field);
    const b: unknown = Reflect.get(right, field);
    if (a === b) {
      return 0;
    }
    if (a === null || a === undefined) {
      return 1;
    }
    if (b === null || b === undefined) {
      return -1;
    }
    if (typeof a === "number" && typeof b === "number") {
      return (a - b) * direction;
    }
    return (String(a) < String(b) ? -1 : 1) * direction;
  };
}

export class JsonDatabase implements Database {
  private readonly filePath: string;
  private loaded = false;
  private data: DatabaseData = emptyData();
  private pendingWrite: Promise<unknown> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async init(): Promise<void> {
    if (this.loaded) {
      return;
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    try {
      const content = await fs.readFile(this.filePath, "utf8");
      const parsed = JSON.parse(content) as Partial<DatabaseData>;
      this.data = normalizeParsedData(parsed);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      this.data = emptyData();
    }

    await this.flush();
    this.loaded = true;
  }

  async read<T>(reader: (data: DatabaseData) => T): Promise<T> {
    await this.init();
    return reader(structuredClone(this.data));
  }

  async write<T>(writer: (data: DatabaseData) => T | Promise<T>): Promise<T> {
    await this.init();
    const run = this.pendingWrite.then(async () => {
      const result = await writer(this.data);
      await this.flush();
      return result;
    });
    this.pendingWrite = run.catch(() => undefined);
    return run;
  }

  async reset(): Promise<void> {
    await this.write((data) => {
      Object.assign(data, emptyData());
    });
  }

  async getAll<T extends TableName>(table: T, filters?: Filters<T>, options: ListOptions<T> = {}): Promise<Array<Row<T>>> {
    const { limit = DEFAULT_LIMIT, orderBy, ascending } = options;
    return this.read((data) => {
      const rows: Array<Row<T>> = data[table];
      const matched = rows.filter((row) => matchesFilters(row, filters));
      if (orderBy) {
        matched.sort(compareOn(orderBy, ascending));
      }
      return matched.slice(0, limit);
    });
  }

  async getById<T extends TableName>(table: T, id: string): Promise<Row<T> | null> {
    return this.read((data) => {
      const rows: Array<Row<T>> = data[table];
      return rows.find((row) => row.id === id) ?? null;
    });
  }

  async findOne<T extends TableName>(table: T, filters: Filters<T>): Promise<Row<T> | null> {
    const [row] = await this.getAll(table, filters, { limit: 1 });
    return row ?? null;
  }

  async create<T extends TableName>(table: T, row: Row<T>): Promise<Row<T>> {
    return this.write((data) => {
      const rows: Array<Row<T>> = data[table];
      if (rows.some((existing) => existing.id === row.id)) {
        throw new Error(`Database error: duplicate id ${row.id} in ${table}`);
      }
      rows.push(structuredClone(row));
      return structuredClone(row);
    });
  }

  async createUnique<T extends TableName>(table: T, row: Row<T>, unique: Filters<T>): Promise<Row<T> | null> {
    return this.write((data) => {
      const rows: Array<Row<T>> = data[table];
      if (rows.some((existing) => matchesFilters(existing, unique))) {
        return null;
      }
      rows.push(structuredClone(row));
      return structuredClone(row);
    });
  }

  async updateById<T extends TableName>(table: T, id: string, patch: Partial<Row<T>>): Promise<Row<T> | null> {
    return this.write((data) => {
      const rows: Array<Row<T>> = data[table];
      const row = rows.find((candidate) => candidate.id === id);
      if (!row) {
        return null;
      }

      Object.assign(row, structuredClone(patch), { id });
      return structuredClone(row);
    });
  }

  async updateWhere<T extends TableName>(table: T, filters: Filters<T>, patch: Partial<Row<T>>): Promise<number> {
    return this.write((data) => {
      const rows: Array<Row<T>> = data[table];
      let updated = 0;
      for (const row of rows) {
        if (matchesFilters(row, filters)) {
          Object.assign(row, structuredClone(patch), { id: row.id });
          updated += 1;
        }
      }
      return updated;
    });
  }

  async deleteById<T extends TableName>(table: T, id: string): Promise<boolean> {
    return this.write((data) => {
      const rows: Array<Row<T>> = data[table];
      const index = rows.findIndex((row) => row.id === id);
      if (index === -1) {
        return false;
      }

      rows.splice(index, 1);
      return true;
    });
  }

  newId(): string {
    return randomUUID();
  }

  nowIso(): string {
    return new Date().toISOString();
  }

  private async flush(): Promise<void> {
    await fs.writeFile(this.filePath, JSON.stringify(this.data, null, 2), "utf8");
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
