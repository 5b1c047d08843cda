import { readFileSync } from 'node:fs';
import pino from 'pino';
import { AppError } from '../errors/index.js';
import type { IPhoneStore } from './IPhoneStore.js';
import { phoneCatalogSchema, type PhoneRecord } from './phoneTypes.js';
import { parsePrice } from './fieldParsers.js';
import { findByExactOrSubstringName } from './nameLookup.js';

const logger = pino({ name: 'InMemoryPhoneStore' });

/**
 * Catalog held as a frozen snapshot. Safe to share between concurrent requests.
 */
export class InMemoryPhoneStore implements IPhoneStore {
  private readonly records: readonly PhoneRecord[];

  constructor(records: readonly PhoneRecord[]) {
    const seen = new Set<string>();
    const unique: PhoneRecord[] = [];

    for (const record of records) {
      const key = record.modelName.toLowerCase();
      if (seen.has(key)) {
        logger.warn({ modelName: record.modelName }, 'Duplicate model name in catalog, keeping first');
        continue;
      }
      seen.add(key);
      unique.push(Object.freeze({ ...record }));
    }

    this.records = Object.freeze(unique);
  }

  /**
   * Loads and validates a JSON seed file (an array of phone records).
   */
  static fromFile(path: string): InMemoryPhoneStore {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw AppError.catalogLoad(path, cause?.message ?? String(error), cause);
    }

    const parsed = phoneCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw AppError.catalogLoad(path, issues.join(', '), parsed.error);
    }

    logger.info({ path, count: parsed.data.length }, 'Catalog seed loaded');
    return new InMemoryPhoneStore(parsed.data);
  }

  listAllNames(): string[] {
    return this.records.map(record => record.modelName);
  }

  getByExactOrSubstringName(name: string): PhoneRecord | null {
    return findByExactOrSubstringName(this.records, name);
  }

  filterByPricePredicate(max: number): PhoneRecord[] {
    return this.records.filter(record => {
      const price = parsePrice(record.price);
      return price !== null && price <= max;
    });
  }

  listAll(): PhoneRecord[] {
    return [...this.records];
  }

  count(): number {
    return this.records.length;
  }
}
