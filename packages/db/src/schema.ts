import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type Pool } from 'pg';

export const SCHEMA_PATH = join(__dirname, '..', 'schema.sql');

/** Creates any missing tables and indexes. Safe to run repeatedly. */
export async function createSchema(pool: Pool, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf-8');
  await pool.query(sql);
}
