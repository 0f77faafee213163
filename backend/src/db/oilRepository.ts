import { randomUUID } from 'node:crypto';
import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import type {
  OilResource,
  OilResourceCreateInput,
  OilResourcePatch,
  OilType,
} from '../types/oil.js';

interface OilRow {
  id: string;
  date: string;
  price: number;
  type: OilType;
  oil_document_url: string | null;
  user_id: string | null;
  email: string | null;
  created_at: string;
  updated_at: string;
}

export type PageRequest =
  | { direction: 'next'; after?: string; size: number }
  | { direction: 'prev'; before: string; size: number };

export interface PageSlice {
  items: OilResource[];
  hasPrevious: boolean;
  hasNext: boolean;
}

export interface OilRepository {
  get(id: string): OilResource | null;
  getAll(): OilResource[];
  getByDate(date: string): OilResource[];
  count(): number;
  page(request: PageRequest): PageSlice;
  create(input: OilResourceCreateInput): OilResource;
  update(id: string, patch: OilResourcePatch): OilResource | null;
  delete(id: string): boolean;
}

const COLUMNS = 'id, date, price, type, oil_document_url, user_id, email, created_at, updated_at';

const PATCHABLE_COLUMNS = ['date', 'price', 'type', 'oil_document_url'] as const;

function mapRow(row: OilRow): OilResource {
  return {
    id: row.id,
    date: row.date,
    price: Number(row.price),
    type: row.type,
    oil_document_url: row.oil_document_url ?? null,
    userId: row.user_id ?? null,
    email: row.email ?? null,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function createOilRepository(
  db: BetterSqlite3Database,
  now: () => Date = () => new Date(),
): OilRepository {
  const selectById = db.prepare<[string], OilRow>(`SELECT ${COLUMNS} FROM oil_resources WHERE id = ?`);
  const existsBefore = db.prepare<[string], { found: number }>(
    'SELECT 1 AS found FROM oil_resources WHERE id < ? LIMIT 1',
  );
  const existsAfter = db.prepare<[string], { found: number }>(
    'SELECT 1 AS found FROM oil_resources WHERE id > ? LIMIT 1',
  );

  function get(id: string): OilResource | null {
    const row = selectById.get(id);
    return row ? mapRow(row) : null;
  }

  function forwardPage(after: string | undefined, size: number): PageSlice {
    const rows =
      after === undefined
        ? db.prepare<[number], OilRow>(`SELECT ${COLUMNS} FROM oil_resources ORDER BY id ASC LIMIT ?`).all(size + 1)
        : db
            .prepare<[string, number], OilRow>(
              `SELECT ${COLUMNS} FROM oil_resources WHERE id > ? ORDER BY id ASC LIMIT ?`,
            )
            .all(after, size + 1);

    const items = rows.slice(0, size).map(mapRow);
    const first = items[0];
    let hasPrevious = false;
    if (first) {
      hasPrevious = existsBefore.get(first.id) !== undefined;
    } else if (after !== undefined) {
      hasPrevious = existsBefore.get(after) !== undefined || selectById.get(after) !== undefined;
    }
    return { items, hasPrevious, hasNext: rows.length > size };
  }

  function backwardPage(before: string, size: number): PageSlice {
    const rows = db
      .prepare<[string, number], OilRow>(
        `SELECT ${COLUMNS} FROM oil_resources WHERE id < ? ORDER BY id DESC LIMIT ?`,
      )
      .all(before, size + 1);

    const items = rows.slice(0, size).reverse().map(mapRow);
    const last = items[items.length - 1];
    const hasNext = last
      ? existsAfter.get(last.id) !== undefined
      : existsAfter.get(before) !== undefined || selectById.get(before) !== undefined;
    return { items, hasPrevious: rows.length > size, hasNext };
  }

  return {
    get,

    getAll() {
      return db.prepare<[], OilRow>(`SELECT ${COLUMNS} FROM oil_resources ORDER BY id`).all().map(mapRow);
    },

    getByDate(date) {
      return db
        .prepare<[string], OilRow>(`SELECT ${COLUMNS} FROM oil_resources WHERE date = ? ORDER BY id`)
        .all(date)
        .map(mapRow);
    },

    count() {
      const row = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM oil_resources').get();
      return Number(row?.total ?? 0);
    },

    page(request) {
      return request.direction === 'prev'
        ? backwardPage(request.before, request.size)
        : forwardPage(request.after, request.size);
    },

    create(input) {
      const timestamp = now().toISOString();
      const id = randomUUID();
      db.prepare(
        `INSERT INTO oil_resources (id, date, price, type, oil_document_url, user_id, email, created_at, updated_at)
         VALUES (@id, @date, @price, @type, @oil_document_url, @user_id, @email, @created_at, @updated_at)`,
      ).run({
        id,
        date: input.date,
        price: input.price,
        type: input.type,
        oil_document_url: input.oil_document_url ?? null,
        user_id: input.userId,
        email: input.email,
        created_at: timestamp,
        updated_at: timestamp,
      });

      const created = get(id);
      if (!created) {
        throw new Error('Failed to retrieve oil resource after insert');
      }
      return created;
    },

    update(id, patch) {
      const existing = get(id);
      if (!existing) {
        return null;
      }

      const assignments: string[] = [];
      const params: Record<string, string | number | null> = { id };
      for (const column of PATCHABLE_COLUMNS) {
        const value = patch[column];
        if (value === undefined) continue;
        assignments.push(`${column} = @${column}`);
        params[column] = value;
      }
      if (assignments.length === 0) {
        return existing;
      }

      params.updated_at = now().toISOString();
      assignments.push('updated_at = @updated_at');
      db.prepare(`UPDATE oil_resources SET ${assignments.join(', ')} WHERE id = @id`).run(params);
      return get(id);
    },

    delete(id) {
      const result = db.prepare('DELETE FROM oil_resources WHERE id = ?').run(id);
      return Number(result.changes ?? 0) > 0;
    },
  };
}
