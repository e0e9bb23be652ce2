import { randomUUID } from "node:crypto";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { DEFAULT_LIMIT, type Database, type ListOptions } from "./database.js";
import { tableColumns, type Filters, type Row, type TableName } from "./models.js";

export interface SupabaseDatabaseOptions {
  url: string;
  serviceKey: string;
}

export function toSnake(field: string): string {
  return field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/** Maps a camelCase row or patch onto column names, dropping undefined values. */
export function toColumns(values: object): Record<string, unknown> {
  const columns: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      columns[toSnake(key)] = value;
    }
  }
  return columns;
}

function patchColumns(patch: object): Record<string, unknown> {
  const columns = toColumns(patch);
  delete columns.id;
  return columns;
}

/** PostgREST select list that aliases every column back to its camelCase field. */
export function selectList(table: TableName): string {
  return tableColumns[table]
    .map((field) => {
      const column = toSnake(field);
      return column === field ? field : `${field}:${column}`;
    })
    .join(",");
}

const UNIQUE_VIOLATION = "23505";

export class SupabaseDatabase implements Database {
  private readonly client: SupabaseClient;

  constructor(options: SupabaseDatabaseOptions | SupabaseClient) {
    this.client =
      "from" in options
        ? options
        : createClient(options.url, options.serviceKey, { auth: { persistSession: false } });
  }

  async getAll<T extends TableName>(table: T, filters?: Filters<T>, options: ListOptions<T> = {}): Promise<Array<Row<T>>> {
    const { limit = DEFAULT_LIMIT, orderBy, ascending = true } = options;
    let query = this.client.from(table).select<string, Row<T>>(selectList(table));
    for (const [column, value] of Object.entries(toColumns(filters ?? {}))) {
      query = query.eq(column, value);
    }
    const ordered = orderBy ? query.order(toSnake(orderBy), { ascending, nullsFirst: false }) : query;

    const { data, error } = await ordered.limit(limit);
    if (error) {
      throw new Error(`Database error: ${error.message}`);
    }

    const rows: Array<Row<T>> = data ?? [];
    return rows;
  }

  async getById<T extends TableName>(table: T, id: string): Promise<Row<T> | null> {
    const { data, error } = await this.client.from(table).select<string, Row<T>>(selectList(table)).eq("id", id).maybeSingle();
    if (error) {
      throw new Error(`Database error: ${error.message}`);
    }

    const row: Row<T> | null = data;
    return row;
  }

  async findOne<T extends TableName>(table: T, filters: Filters<T>): Promise<Row<T> | null> {
    const [row] = await this.getAll(table, filters, { limit: 1 });
    return row ?? null;
  }

  async create<T extends TableName>(table: T, row: Row<T>): Promise<Row<T>> {
    const { data, error } = await this.client.from(table).insert(toColumns(row)).select<string, Row<T>>(selectList(table)).single();
    if (error) {
      throw new Error(`Database error: ${error.message}`);
    }

    const created: Row<T> = data;
    return created;
  }

  /** Relies on a unique index over the `unique` columns; a violation reads as a conflict. */
  async createUnique<T extends TableName>(table: T, row: Row<T>, unique: Filters<T>): Promise<Row<T> | null> {
    if (await this.findOne(table, unique)) {
      return null;
    }

    const { data, error } = await this.client.from(table).insert(toColumns(row)).select<string, Row<T>>(selectList(table)).single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        return null;
      }
      throw new Error(`Database error: ${error.message}`);
    }

    const created: Row<T> = data;
    return created;
  }

  async updateById<T extends TableName>(table: T, id: string, patch: Partial<Row<T>>): Promise<Row<T> | null> {
    const { data, error } = await this.client
      .from(table)
      .update(patchColumns(patch))
      .eq("id", id)
      .select<string, Row<T>>(selectList(table))
      .maybeSingle();
    if (error) {
      throw new Error(`Database error: ${error.message}`);
    }

    const updated: Row<T> | null = data;
    return updated;
  }

  async updateWhere<T extends TableName>(table: T, filters: Filters<T>, patch: Partial<Row<T>>): Promise<number> {
    let query = this.client.from(table).update(patchColumns(patch));
    for (const [column, value] of Object.entries(toColumns(filters))) {
      query = query.eq(column, value);
    }

    const { data, error } = await query.select("id");
    if (error) {
      throw new Error(`Database error: ${error.message}`);
    }

    return data?.length ?? 0;
  }

  async deleteById<T extends TableName>(table: T, id: string): Promise<boolean> {
    const { data, error } = await this.client.from(table).delete().eq("id", id).select("id");
    if (error) {
      throw new Error(`Database error: ${error.message}`);
    }

    return (data?.length ?? 0) > 0;
  }

  newId(): string {
    return randomUUID();
  }

  nowIso(): string {
    return new Date().toISOString();
  }
}
