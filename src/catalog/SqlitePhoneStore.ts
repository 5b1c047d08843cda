import Database from 'better-sqlite3';
import pino from 'pino';
import { AppError } from '../errors/index.js';
import type { IPhoneStore } from './IPhoneStore.js';
import type { PhoneRecord } from './phoneTypes.js';
import { parsePrice } from './fieldParsers.js';
import { stripBrandTokens } from './nameLookup.js';

const logger = pino({ name: 'SqlitePhoneStore' });

interface PhoneRow {
  id: number;
  model_name: string;
  release_date: string;
  display: string;
  battery: string;
  camera: string;
  ram: string;
  storage: string;
  price: string;
  chipset: string;
  os: string;
  body: string;
  url: string;
}

export interface SqlitePhoneStoreOptions {
  /** Database file path, or ":memory:" */
  filename: string;
  readonly?: boolean;
}

type PhoneInsertParams = Omit<PhoneRow, 'id'>;

const PHONE_COLUMNS =
  'id, model_name, release_date, display, battery, camera, ram, storage, price, chipset, os, body, url';

function rowToRecord(row: PhoneRow): PhoneRecord {
  return Object.freeze({
    modelName: row.model_name,
    releaseDate: row.release_date,
    display: row.display,
    battery: row.battery,
    camera: row.camera,
    ram: row.ram,
    storage: row.storage,
    price: row.price,
    chipset: row.chipset,
    os: row.os,
    body: row.body,
    url: row.url,
  });
}

function openDatabase(options: SqlitePhoneStoreOptions): Database.Database {
  try {
    return new Database(options.filename, { readonly: options.readonly ?? false });
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw AppError.catalogLoad(options.filename, cause?.message ?? String(error), cause);
  }
}

/**
 * Catalog backed by an embedded SQLite database (better-sqlite3).
 *
 * The `phones` table is keyed by a unique model_name; rows are returned in
 * insertion order, which is the catalog order the resolver relies on.
 */
export class SqlitePhoneStore implements IPhoneStore {
  private readonly db: Database.Database;

  constructor(options: SqlitePhoneStoreOptions) {
    this.db = openDatabase(options);

    if (!options.readonly) {
      this.db.pragma('journal_mode = WAL');
      this.ensureSchema();
    }

    logger.info({ filename: options.filename, count: this.count() }, 'SQLite catalog opened');
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS phones (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        model_name TEXT NOT NULL UNIQUE,
        release_date TEXT NOT NULL DEFAULT '',
        display TEXT NOT NULL DEFAULT '',
        battery TEXT NOT NULL DEFAULT '',
        camera TEXT NOT NULL DEFAULT '',
        ram TEXT NOT NULL DEFAULT '',
        storage TEXT NOT NULL DEFAULT '',
        price TEXT NOT NULL DEFAULT '',
        chipset TEXT NOT NULL DEFAULT '',
        os TEXT NOT NULL DEFAULT '',
        body TEXT NOT NULL DEFAULT '',
        url TEXT NOT NULL DEFAULT ''
      );
    `);
  }

  /**
   * Inserts records, updating rows whose model_name already exists.
   * Returns the number of records written.
   */
  insertMany(records: readonly PhoneRecord[]): number {
    const upsert = this.db.prepare<PhoneInsertParams>(`
      INSERT INTO phones (model_name, release_date, display, battery, camera, ram, storage, price, chipset, os, body, url)
      VALUES (@model_name, @release_date, @display, @battery, @camera, @ram, @storage, @price, @chipset, @os, @body, @url)
      ON CONFLICT(model_name) DO UPDATE SET
        release_date = excluded.release_date,
        display = excluded.display,
        battery = excluded.battery,
        camera = excluded.camera,
        ram = excluded.ram,
        storage = excluded.storage,
        price = excluded.price,
        chipset = excluded.chipset,
        os = excluded.os,
        body = excluded.body,
        url = excluded.url
    `);

    const writeAll = this.db.transaction((batch: readonly PhoneRecord[]) => {
      for (const record of batch) {
        upsert.run({
          model_name: record.modelName,
          release_date: record.releaseDate,
          display: record.display,
          battery: record.battery,
          camera: record.camera,
          ram: record.ram,
          storage: record.storage,
          price: record.price,
          chipset: record.chipset,
          os: record.os,
          body: record.body,
          url: record.url,
        });
      }
      return batch.length;
    });

    return writeAll(records);
  }

  listAllNames(): string[] {
    return this.db
      .prepare<[], { model_name: string }>('SELECT model_name FROM phones ORDER BY id')
      .all()
      .map(row => row.model_name);
  }

  getByExactOrSubstringName(name: string): PhoneRecord | null {
    const needle = name.trim().toLowerCase();
    if (needle.length === 0) {
      return null;
    }

    const exact = this.db
      .prepare<[string], PhoneRow>(`SELECT ${PHONE_COLUMNS} FROM phones WHERE lower(model_name) = ? ORDER BY id LIMIT 1`)
      .get(needle);
    if (exact) {
      return rowToRecord(exact);
    }

    const containing = this.db.prepare<[string], PhoneRow>(
      `SELECT ${PHONE_COLUMNS} FROM phones WHERE instr(lower(model_name), ?) > 0 ORDER BY id LIMIT 1`
    );

    const contains = containing.get(needle);
    if (contains) {
      return rowToRecord(contains);
    }

    const stripped = stripBrandTokens(needle);
    if (stripped.length === 0) {
      return null;
    }

    const strippedMatch = containing.get(stripped);
    return strippedMatch ? rowToRecord(strippedMatch) : null;
  }

  filterByPricePredicate(max: number): PhoneRecord[] {
    // Prices are free text, so the predicate runs in process
    return this.listAll().filter(record => {
      const price = parsePrice(record.price);
      return price !== null && price <= max;
    });
  }

  listAll(): PhoneRecord[] {
    return this.db
      .prepare<[], PhoneRow>(`SELECT ${PHONE_COLUMNS} FROM phones ORDER BY id`)
      .all()
      .map(rowToRecord);
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM phones').get();
    return row?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
