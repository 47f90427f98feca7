/**
 * Drizzle client over Neon's HTTP driver.
 *
 * Each query is a single HTTP round trip, which suits the one-row updates
 * the job pipeline issues. Tests replace this module with an in-process
 * PGlite database (see test/setup.ts).
 *
 * @module db/client
 */

import { neon } from "@neondatabase/serverless"
import { drizzle } from "drizzle-orm/neon-http"
import * as schema from "./schema"

const databaseUrl = process.env.DATABASE_URL

if (!databaseUrl) {
  throw new Error("DATABASE_URL is not set")
}

export const db = drizzle(neon(databaseUrl), { schema })

export type Database = typeof db
