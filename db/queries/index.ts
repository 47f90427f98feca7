/**
 * Database Query Functions - Barrel Export
 *
 * ## Query Modules
 *
 * - **jobs** - Playbook job lifecycle
 *   - `createJob()` - Insert a job for a stored upload
 *   - `getJobById()` - Fetch one job
 *   - `claimJob()` - Mark a job as started, at most once
 *   - `updateJobProgress()` - Write percent + message
 *   - `markJobCompleted()` / `markJobFailed()` - Terminal transitions
 *
 * @module db/queries
 */

export * as jobs from "./jobs"
