// test/setup.ts
// In-process Postgres with the transaction rollback pattern for test isolation
import { PGlite } from "@electric-sql/pglite"
import { drizzle } from "drizzle-orm/pglite"
import { sql } from "drizzle-orm"
import { beforeAll, beforeEach, afterEach, afterAll, vi } from "vitest"
import * as schema from "@/db/schema"

// Create in-memory PGlite instance
const client = new PGlite()
export const testDb = drizzle(client, { schema })

// Mock the db module
vi.mock("@/db/client", () => ({
  db: testDb,
}))

// Track transaction state
let inTransaction = false

// Mirrors db/schema/jobs.ts
const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS jobs (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    status TEXT NOT NULL DEFAULT 'processing',
    progress INTEGER NOT NULL DEFAULT 0,
    message TEXT NOT NULL DEFAULT '',
    error_code TEXT,
    error_message TEXT,
    original_filename TEXT NOT NULL,
    file_path TEXT NOT NULL,
    agreement_type TEXT NOT NULL,
    user_role TEXT NOT NULL,
    risk_tolerance TEXT NOT NULL,
    output_path TEXT,
    output_filename TEXT,
    chunk_count INTEGER,
    failed_chunk_count INTEGER NOT NULL DEFAULT 0,
    token_usage JSONB,
    started_at TIMESTAMPTZ,
    completed_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
`

beforeAll(async () => {
  await client.exec(SCHEMA_SQL)
})

// Use transaction rollback pattern for fast test isolation
// Each test runs in a transaction that gets rolled back
beforeEach(async () => {
  await testDb.execute(sql`BEGIN`)
  inTransaction = true
})

afterEach(async () => {
  if (inTransaction) {
    await testDb.execute(sql`ROLLBACK`)
    inTransaction = false
  }
})

afterAll(async () => {
  if (inTransaction) {
    await testDb.execute(sql`ROLLBACK`)
    inTransaction = false
  }
  await client.close()
})
