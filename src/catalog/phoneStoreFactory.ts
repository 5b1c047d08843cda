import pino from 'pino';
import type { IPhoneStore } from './IPhoneStore.js';
import { InMemoryPhoneStore } from './InMemoryPhoneStore.js';
import { SqlitePhoneStore } from './SqlitePhoneStore.js';

const logger = pino({ name: 'phoneStoreFactory' });

export type PhoneStoreType = 'memory' | 'sqlite';

export interface PhoneStoreFactoryOptions {
  store: PhoneStoreType;
  seedPath: string;
  sqlitePath: string;
}

export interface PhoneStoreFactoryResult {
  store: IPhoneStore;
  type: PhoneStoreType;
  /** Releases database handles; a no-op for the in-memory store */
  close: () => void;
}

export function createPhoneStore(options: PhoneStoreFactoryOptions): PhoneStoreFactoryResult {
  if (options.store === 'sqlite') {
    const sqliteStore = new SqlitePhoneStore({ filename: options.sqlitePath });

    if (sqliteStore.count() === 0) {
      logger.warn(
        { sqlitePath: options.sqlitePath },
        'SQLite catalog is empty. Run `npm run seed:sqlite` to load the seed file.'
      );
    }

    return {
      store: sqliteStore,
      type: 'sqlite',
      close: () => sqliteStore.close(),
    };
  }

  return {
    store: InMemoryPhoneStore.fromFile(options.seedPath),
    type: 'memory',
    close: () => undefined,
  };
}
