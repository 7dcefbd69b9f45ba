#!/usr/bin/env npx tsx
/**
 * Create the tokens table in the configured database.
 *
 * Usage:
 *   DATABASE_PATH=./data/qbo.db npm run migrate
 */

import config from '../src/config.js';
import { openTokenDatabase } from '../src/services/credentials/sqlite.js';

const dbPath = config.credentials.databasePath;
if (!dbPath) {
  console.error('Set DATABASE_PATH before running the migration');
  process.exit(1);
}

const db = openTokenDatabase(dbPath);
const columns = db.prepare('PRAGMA table_info(tokens)').all().length;
db.close();

console.log(`Migration complete: tokens table has ${columns} columns (${dbPath})`);
