import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { config } from '../config/app.js';

export type PartRow = {
  part_name: string | null;
  part_id: string | null;
  mpn_id: string | null;
  part_price: number | null;
  install_difficulty: string | null;
  install_time: string | null;
  symptoms: string | null;
  appliance_types: string | null;
  replace_parts: string | null;
  brand: string | null;
  availability: string | null;
  install_video_url: string | null;
  product_url: string | null;
};

export interface PartsQuery {
  partNumber?: string;
  keywords?: string;
  applianceType?: string;
  brand?: string;
  limit?: number;
}

type BindParams = Record<string, string | number>;

const PART_COLUMNS: ReadonlyArray<keyof PartRow> = [
  'part_name',
  'part_id',
  'mpn_id',
  'part_price',
  'install_difficulty',
  'install_time',
  'symptoms',
  'appliance_types',
  'replace_parts',
  'brand',
  'availability',
  'install_video_url',
  'product_url'
];

const SELECT_COLUMNS = PART_COLUMNS.join(', ');
const MAX_KEYWORD_TERMS = 6;
const STOP_WORDS = new Set(['the', 'and', 'for', 'with', 'my', 'is', 'not', 'part', 'parts', 'what', 'how', 'does', 'need']);

function ensureDirectory(path: string) {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function keywordTerms(keywords: string): string[] {
  const terms = keywords
    .toLowerCase()
    .split(/[^a-z0-9-]+/)
    .filter((term) => term.length >= 3 && !STOP_WORDS.has(term));
  return [...new Set(terms)].slice(0, MAX_KEYWORD_TERMS);
}

/**
 * Read model over the structured parts catalog. The table layout mirrors the
 * catalog export; it is populated out of band.
 */
export class CatalogStore {
  private readonly db: Database.Database;

  constructor(dbPath: string = config.CATALOG_DB_PATH) {
    if (dbPath === ':memory:') {
      this.db = new Database(dbPath);
    } else {
      const absolute = resolve(dbPath);
      ensureDirectory(absolute);
      this.db = new Database(absolute);
      this.db.pragma('journal_mode = WAL');
    }
    this.initialize();
  }

  private initialize() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS parts (
        part_name TEXT,
        part_id TEXT,
        mpn_id TEXT,
        part_price REAL,
        install_difficulty TEXT,
        install_time TEXT,
        symptoms TEXT,
        appliance_types TEXT,
        replace_parts TEXT,
        brand TEXT,
        availability TEXT,
        install_video_url TEXT,
        product_url TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_parts_part_id ON parts (part_id);
      CREATE INDEX IF NOT EXISTS idx_parts_mpn_id ON parts (mpn_id);
    `);
  }

  insertParts(rows: readonly PartRow[]): number {
    const statement = this.db.prepare<PartRow>(
      `INSERT INTO parts (${SELECT_COLUMNS}) VALUES (${PART_COLUMNS.map((column) => `@${column}`).join(', ')})`
    );
    const insertAll = this.db.transaction((batch: readonly PartRow[]) => {
      for (const row of batch) {
        statement.run(row);
      }
      return batch.length;
    });
    return insertAll(rows);
  }

  /** Exact lookup by catalog id or manufacturer part number, including parts it replaces. */
  findByPartNumber(partNumber: string, limit = config.CATALOG_MAX_ROWS): PartRow[] {
    const normalized = partNumber.trim().toUpperCase();
    if (!normalized) {
      return [];
    }
    return this.db
      .prepare<BindParams, PartRow>(
        `SELECT ${SELECT_COLUMNS} FROM parts
          WHERE UPPER(part_id) = @partNumber
             OR UPPER(mpn_id) = @partNumber
             OR UPPER(replace_parts) LIKE @partNumberLike
          ORDER BY CASE WHEN UPPER(part_id) = @partNumber OR UPPER(mpn_id) = @partNumber THEN 0 ELSE 1 END, part_name
          LIMIT @limit`
      )
      .all({ partNumber: normalized, partNumberLike: `%${normalized}%`, limit });
  }

  /** Keyword search over part names and symptoms, ranked by the number of matching terms. */
  searchParts(query: PartsQuery): PartRow[] {
    const terms = keywordTerms(query.keywords ?? '');
    const limit = query.limit ?? config.CATALOG_MAX_ROWS;
    const params: BindParams = { limit };
    const filters: string[] = [];

    if (query.applianceType?.trim()) {
      filters.push('appliance_types LIKE @applianceType');
      params.applianceType = `%${query.applianceType.trim()}%`;
    }
    if (query.brand?.trim()) {
      filters.push('brand LIKE @brand');
      params.brand = `%${query.brand.trim()}%`;
    }

    const scoreTerms = terms.map((term, idx) => {
      params[`term${idx}`] = `%${term}%`;
      return `(CASE WHEN part_name LIKE @term${idx} OR symptoms LIKE @term${idx} THEN 1 ELSE 0 END)`;
    });

    if (!scoreTerms.length && !filters.length) {
      return [];
    }

    const score = scoreTerms.length ? scoreTerms.join(' + ') : '1';
    const where = filters.length ? `WHERE ${filters.join(' AND ')}` : '';

    return this.db
      .prepare<BindParams, PartRow>(
        `SELECT ${SELECT_COLUMNS} FROM (
           SELECT ${SELECT_COLUMNS}, ${score} AS score FROM parts ${where}
         )
         WHERE score > 0
         ORDER BY score DESC, part_name
         LIMIT @limit`
      )
      .all(params);
  }

  close() {
    this.db.close();
  }
}

let sharedCatalog: CatalogStore | null = null;

export function getCatalogStore(): CatalogStore {
  if (!sharedCatalog) {
    sharedCatalog = new CatalogStore();
  }
  return sharedCatalog;
}
