/**
 * Shared column helpers spread into table definitions.
 *
 * @module db/_columns
 */

import { timestamp, uuid } from "drizzle-orm/pg-core"

/** UUID primary key generated by Postgres */
export const primaryId = {
  id: uuid("id").primaryKey().defaultRandom(),
}

/** created_at / updated_at; updated_at is refreshed on every Drizzle update */
export const timestamps = {
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow()
    .$onUpdate(() => new Date()),
}
