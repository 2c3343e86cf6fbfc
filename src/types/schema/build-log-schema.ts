/**
 * Build log input schemas — what the forge hands over for a pull request's CI runs.
 *
 * One {@link JobLogInput} per CI job; the log navigator turns a list of them
 * into a `LogTree` (see `core/log/tree.ts`).
 *
 * @module build-log-schema
 */
import { z } from 'zod'

/**
 * Outcome of a single CI job as reported by the forge.
 *
 * @category Build Logs
 */
export const JobStatusSchema = z.enum([
  'success',
  'failure',
  'cancelled',
  'skipped',
  'inProgress',
  'unknown',
])
/** @category Build Logs */
export type JobStatus = z.infer<typeof JobStatusSchema>

/**
 * Per-job metadata shown next to the job row. Keyed by `"{workflow}:{job}"`
 * in the log panel.
 *
 * @category Build Logs
 */
export const JobMetadataSchema = z.object({
  workflowName: z.string(),
  jobName: z.string(),
  status: JobStatusSchema,
  /** Wall-clock runtime; `null` while the job has not finished. */
  durationMs: z.number().int().nonnegative().nullable(),
  htmlUrl: z.string().default(''),
})
/** @category Build Logs */
export type JobMetadata = z.infer<typeof JobMetadataSchema>

/**
 * Raw log text of one job together with its metadata.
 *
 * @category Build Logs
 */
export const JobLogInputSchema = z.object({
  metadata: JobMetadataSchema,
  log: z.string(),
})
/** @category Build Logs */
export type JobLogInput = z.infer<typeof JobLogInputSchema>
