#!/usr/bin/env tsx
/**
 * Dev-only CLI script that loads the JSON seed file into the SQLite catalog.
 *
 * Usage:
 *   npm run seed:sqlite              # seed CATALOG_SQLITE_PATH from CATALOG_SEED_PATH
 *   npm run seed:sqlite -- --dry-run # validate the seed file only
 *
 * Existing rows are updated in place (keyed by model name).
 */

import { config } from '../src/config.js';
import { InMemoryPhoneStore, SqlitePhoneStore } from '../src/catalog/index.js';

const DRY_RUN_FLAG = '--dry-run';

function printUsage(): void {
  console.log('Usage: tsx scripts/seed-catalog.ts [--dry-run]');
  console.log('');
  console.log('Options:');
  console.log('  --dry-run    Validate the seed file without writing the database');
  console.log('');
  console.log('Environment variables:');
  console.log(`  CATALOG_SEED_PATH    (current: ${config.catalog.seedPath})`);
  console.log(`  CATALOG_SQLITE_PATH  (current: ${config.catalog.sqlitePath})`);
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  console.log('Catalog seed - Dev-only utility');
  console.log('===============================\n');

  try {
    console.log(`Reading seed file: ${config.catalog.seedPath}`);
    const seed = InMemoryPhoneStore.fromFile(config.catalog.seedPath);
    console.log(`  ${seed.count()} phone(s) validated\n`);

    if (args.includes(DRY_RUN_FLAG)) {
      console.log('Dry run, nothing written.');
      return;
    }

    console.log(`Writing SQLite catalog: ${config.catalog.sqlitePath}`);
    const sqliteStore = new SqlitePhoneStore({ filename: config.catalog.sqlitePath });
    try {
      const written = sqliteStore.insertMany(seed.listAll());
      console.log(`  ${written} phone(s) written, ${sqliteStore.count()} in catalog`);
    } finally {
      sqliteStore.close();
    }
  } catch (error) {
    console.error('\nError:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main();
