import { Pool, type QueryResultRow } from 'pg';
import { z } from 'zod';
import { InvalidCollectionError, errorMessage } from './errors';

// ===== DOCUMENT FILTERS =====

export type JsonScalar = string | number | boolean | null;

export type DocumentFilter =
  | { op: 'eq'; field: string; value: JsonScalar }
  // Case-insensitive substring match; on an array field any element may match
  | { op: 'contains'; field: string; text: string }
  | { op: 'and'; filters: DocumentFilter[] }
  | { op: 'or'; filters: DocumentFilter[] };

export const eq = (field: string, value: JsonScalar): DocumentFilter => ({ op: 'eq', field, value });
export const contains = (field: string, text: string): DocumentFilter => ({ op: 'contains', field, text });
export const and = (...filters: DocumentFilter[]): DocumentFilter => ({ op: 'and', filters });
export const or = (...filters: DocumentFilter[]): DocumentFilter => ({ op: 'or', filters });
export const matchAll = (): DocumentFilter => and();

export type StoredDocument = Record<string, unknown> & {
  id: string;
  created_at: string;
};

/*
  Document store consumed by the HTTP layer.
  One instance per process, constructed at startup and injected into the app.
*/
export interface DocumentStore {
  readonly name: string;
  createDocument(collection: string, record: Record<string, unknown>): Promise<string>;
  getDocuments(collection: string, filter: DocumentFilter, limit: number): Promise<StoredDocument[]>;
  listCollections(): Promise<string[]>;
  close(): Promise<void>;
}

// ===== POSTGRESQL TRANSLATION =====

const COLLECTION_NAME = /^[a-z_][a-z0-9_]*$/;

export function tableName(collection: string): string {
  if (!COLLECTION_NAME.test(collection)) {
    throw new InvalidCollectionError(collection);
  }
  return `"${collection}"`;
}

export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export interface WhereClause {
  text: string;
  values: unknown[];
}

/*
  Translates a filter tree into a parameterised condition over the jsonb `doc` column.
  Placeholders are numbered after any values already in `values`.
*/
export function buildWhereClause(filter: DocumentFilter, values: unknown[] = []): WhereClause {
  const param = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  const build = (node: DocumentFilter): string => {
    switch (node.op) {
      case 'eq': {
        const field = param(node.field);
        return `doc -> ${field}::text = ${param(JSON.stringify(node.value))}::jsonb`;
      }
      case 'contains': {
        const field = param(node.field);
        const pattern = param(`%${escapeLike(node.text)}%`);
        return (
          `EXISTS (SELECT 1 FROM jsonb_array_elements_text(` +
          `CASE WHEN jsonb_typeof(doc -> ${field}::text) = 'array' ` +
          `THEN doc -> ${field}::text ELSE jsonb_build_array(doc -> ${field}::text) END` +
          `) AS element(value) WHERE element.value ILIKE ${pattern})`
        );
      }
      case 'and':
        return node.filters.length === 0 ? 'TRUE' : `(${node.filters.map(build).join(' AND ')})`;
      case 'or':
        return node.filters.length === 0 ? 'FALSE' : `(${node.filters.map(build).join(' OR ')})`;
    }
  };

  const text = build(filter);
  return { text, values };
}

// ===== POSTGRESQL STORE =====

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
  end(): Promise<void>;
}

const documentRowSchema = z.object({
  id: z.string(),
  doc: z.record(z.unknown()),
  created_at: z.date(),
});

const insertedRowSchema = z.object({ id: z.string() });
const tableRowSchema = z.object({ table_name: z.string() });
const databaseRowSchema = z.object({ name: z.string() });

/*
  Document store on PostgreSQL.
  Each collection is a table holding one jsonb document per row; `seq` keeps insertion order.
*/
export class PgDocumentStore implements DocumentStore {
  private readonly ready = new Map<string, Promise<void>>();

  constructor(
    private readonly client: SqlClient,
    readonly name: string
  ) {}

  async createDocument(collection: string, record: Record<string, unknown>): Promise<string> {
    const table = await this.ensureCollection(collection);
    const result = await this.client.query(
      `INSERT INTO ${table} (doc) VALUES ($1::jsonb) RETURNING id`,
      [JSON.stringify(record)]
    );
    return insertedRowSchema.parse(result.rows[0]).id;
  }

  async getDocuments(collection: string, filter: DocumentFilter, limit: number): Promise<StoredDocument[]> {
    const table = await this.ensureCollection(collection);
    const where = buildWhereClause(filter);
    const limitParam = `$${where.values.length + 1}`;
    const result = await this.client.query(
      `SELECT id, doc, created_at FROM ${table} WHERE ${where.text} ORDER BY seq LIMIT ${limitParam}`,
      [...where.values, limit]
    );

    return result.rows.map((raw) => {
      const row = documentRowSchema.parse(raw);
      return { ...row.doc, id: row.id, created_at: row.created_at.toISOString() };
    });
  }

  async listCollections(): Promise<string[]> {
    const result = await this.client.query(
      'SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema() ORDER BY table_name'
    );
    return result.rows.map((row) => tableRowSchema.parse(row).table_name);
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  // Concurrent first uses of a collection share one CREATE TABLE
  private async ensureCollection(collection: string): Promise<string> {
    const table = tableName(collection);
    let creating = this.ready.get(collection);
    if (!creating) {
      creating = this.createTable(table);
      this.ready.set(collection, creating);
      creating.catch(() => {
        this.ready.delete(collection);
      });
    }
    await creating;
    return table;
  }

  private async createTable(table: string): Promise<void> {
    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${table} (` +
        'id uuid PRIMARY KEY DEFAULT gen_random_uuid(), ' +
        'seq bigserial NOT NULL, ' +
        'doc jsonb NOT NULL, ' +
        'created_at timestamptz NOT NULL DEFAULT now())'
    );
  }
}

/*
  Opens the connection pool and probes it once.
  Returns null when no URL is configured or the probe fails; callers degrade instead of crashing.
*/
export async function connectStore(databaseUrl: string | undefined): Promise<PgDocumentStore | null> {
  if (!databaseUrl) {
    console.warn('[database] DATABASE_URL not set, running without a database');
    return null;
  }

  const pool = new Pool({ connectionString: databaseUrl });
  pool.on('error', (error) => {
    console.error('[database] idle client error:', error.message);
  });

  try {
    const result = await pool.query('SELECT current_database() AS name');
    const { name } = databaseRowSchema.parse(result.rows[0]);
    console.log(`[database] connected to ${name}`);
    return new PgDocumentStore(
      {
        query: (text, values) => pool.query(text, values),
        end: () => pool.end(),
      },
      name
    );
  } catch (error) {
    console.error('[database] connection failed:', errorMessage(error));
    await pool.end();
    return null;
  }
}
