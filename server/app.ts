/**
 * @fileoverview HTTP API
 *
 * Thin routing layer over the job service:
 *
 * | Method | Path                   | Handler                    |
 * | ------ | ---------------------- | -------------------------- |
 * | POST   | /api/upload            | store file, create job     |
 * | POST   | /api/process/:jobId    | run the job synchronously  |
 * | GET    | /api/status/:jobId     | job status view            |
 * | GET    | /api/download/:jobId   | rendered .xlsx attachment  |
 * | GET    | /api/health            | provider configuration     |
 *
 * @module server/app
 */

import { readFile } from 'fs/promises'
import { Hono } from 'hono'
import { bodyLimit } from 'hono/body-limit'
import {
  findJob,
  getJobStatus,
  parseJobId,
  runPlaybookJob,
  submitJob,
  type RunPlaybookJobOptions,
} from '@/jobs'
import { isProviderConfigured } from '@/lib/ai/config'
import type { AppConfig } from '@/lib/config'
import {
  BadRequestError,
  NotFoundError,
  PayloadTooLargeError,
  toAppError,
} from '@/lib/errors'
import { logger } from '@/lib/logger'
import { fail, ok } from './api-response'

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

/** Allowance for multipart framing and the text fields around the file */
const MULTIPART_OVERHEAD_BYTES = 1024 * 1024

function formField(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export interface CreateAppOptions {
  /** Overrides for the pipeline, e.g. a test model */
  pipeline?: Omit<RunPlaybookJobOptions, 'config'>
}

export function createApp(config: AppConfig, options: CreateAppOptions = {}) {
  const app = new Hono()

  app.onError((err, c) => {
    const appError = toAppError(err)

    if (appError.statusCode >= 500) {
      logger.error('API error', {
        code: appError.code,
        message: appError.message,
        method: c.req.method,
        path: c.req.path,
      })
    }

    return c.json(fail(appError), appError.statusCode)
  })

  app.notFound((c) => c.json(fail(new NotFoundError('Route not found')), 404))

  app.get('/api/health', (c) =>
    c.json(
      ok({
        status: 'healthy',
        apiKeyConfigured: isProviderConfigured(config.ai),
        provider: config.ai.provider,
        model: config.ai.model,
      })
    )
  )

  app.post(
    '/api/upload',
    bodyLimit({
      maxSize: config.uploads.maxFileSizeBytes + MULTIPART_OVERHEAD_BYTES,
      onError: (c) => {
        const limitMb = Math.round(config.uploads.maxFileSizeBytes / (1024 * 1024))
        return c.json(fail(new PayloadTooLargeError(`File exceeds the ${limitMb}MB upload limit`)), 413)
      },
    }),
    async (c) => {
      const body = await c.req.parseBody().catch((error: unknown) => {
        throw new BadRequestError('Malformed multipart body', undefined, { cause: error })
      })
      const file = body['file']
      if (!(file instanceof File) || file.name === '') {
        throw new BadRequestError('No file provided')
      }

      const result = await submitJob(
        { filename: file.name, data: new Uint8Array(await file.arrayBuffer()) },
        {
          agreementType: formField(body['agreement_type']),
          userRole: formField(body['user_role']),
          riskTolerance: formField(body['risk_tolerance']),
        },
        config
      )

      return c.json(ok(result))
    }
  )

  app.post('/api/process/:jobId', async (c) => {
    const jobId = parseJobId(c.req.param('jobId'))
    const result = await runPlaybookJob(jobId, { ...options.pipeline, config })

    if (result.error) {
      return c.json(fail(result.error), 500)
    }
    return c.json(ok(result.status))
  })

  app.get('/api/status/:jobId', async (c) => {
    return c.json(ok(await getJobStatus(c.req.param('jobId'))))
  })

  app.get('/api/download/:jobId', async (c) => {
    const job = await findJob(c.req.param('jobId'))
    if (job.status !== 'completed' || !job.outputPath || !job.outputFilename) {
      throw new BadRequestError('File not ready')
    }

    const data = await readFile(job.outputPath)
      .then((buffer) => new Uint8Array(buffer))
      .catch((error: unknown) => {
        logger.warn('Output file missing', {
          jobId: job.id,
          outputPath: job.outputPath,
          error: error instanceof Error ? error.message : String(error),
        })
        throw new NotFoundError('Output file not found')
      })

    return c.body(data, 200, {
      'Content-Type': XLSX_CONTENT_TYPE,
      'Content-Disposition': `attachment; filename="${job.outputFilename}"`,
    })
  })

  return app
}

