import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { pool } from './core/db';

export const db = drizzle(pool);

/** The pooled database or an open transaction; both run the same query builders. */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT>;
