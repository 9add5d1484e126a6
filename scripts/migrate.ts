// ===========================================
// TOKEN STORE DATABASE MIGRATION
// ===========================================

import { config } from 'dotenv';
import { createPool, initializeSchema } from '../src/utils/database.js';

config();

async function runMigration(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error('DATABASE_URL is not set');
    process.exit(1);
  }

  const pool = createPool(databaseUrl);
  try {
    console.log('Creating token store tables...');
    await initializeSchema(pool);

    const tables = await pool.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = 'public' AND table_name IN ('tokens', 'snapshots')
       ORDER BY table_name`
    );
    console.log('Tables present:');
    tables.rows.forEach(row => console.log(`  ${row.table_name}`));
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void runMigration();
