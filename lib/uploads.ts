/**
 * @fileoverview Upload and output file storage on local disk
 *
 * Uploads are stored as `<timestamp>_<jobId>_<sanitised name>` so two
 * uploads of the same file never collide. Rendered playbooks are named
 * `Playbook_<original stem>_<timestamp>.xlsx`.
 *
 * @module lib/uploads
 */

import { mkdir, rm, writeFile } from "node:fs/promises"
import path from "node:path"
import { logger } from "@/lib/logger"

/**
 * Reduces a client-supplied filename to a safe basename: ASCII letters,
 * digits, `_`, `.` and `-` only, whitespace collapsed to `_`, no leading or
 * trailing dots/underscores. Returns `"upload"` when nothing survives.
 */
export function sanitizeFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[^\x20-\x7e]/g, "")
  const cleaned = ascii
    .replace(/[/\\]/g, " ")
    .trim()
    .split(/\s+/)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "")

  return cleaned || "upload"
}

const pad = (n: number) => String(n).padStart(2, "0")

/** `YYYYMMDD_HHMMSS` in local time */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/** Filename without its final extension */
export function fileStem(filename: string): string {
  const ext = path.extname(filename)
  return ext ? filename.slice(0, -ext.length) : filename
}

export function outputFilenameFor(originalFilename: string, date = new Date()): string {
  return `Playbook_${fileStem(originalFilename)}_${formatTimestamp(date)}.xlsx`
}

export interface StoredUpload {
  filePath: string
  /** Sanitised client filename */
  filename: string
}

/** Writes the upload under `dir`, creating the directory if needed */
export async function saveUpload(
  dir: string,
  upload: { jobId: string; filename: string; data: Uint8Array },
  now = new Date()
): Promise<StoredUpload> {
  const filename = sanitizeFilename(upload.filename)
  const filePath = path.join(dir, `${formatTimestamp(now)}_${upload.jobId}_${filename}`)

  await mkdir(dir, { recursive: true })
  await writeFile(filePath, upload.data)

  return { filePath, filename }
}

/** Deletes a stored file. Failures are logged, never thrown. */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true })
  } catch (error) {
    logger.warn("Failed to remove file", {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    })
  }
}
