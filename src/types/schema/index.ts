/**
 * Schema barrel — re-exports all Zod schemas and their inferred types.
 *
 * @module Configuration
 */

// ── Configuration ────────────────────────────────────────────────────────────
export {
  ConfigSchema,
  type Config,
  MergeMethodSchema,
  type MergeMethod,
  ThemeNameSchema,
  type ThemeName,
} from './config-schema'

// ── Pull Requests ────────────────────────────────────────────────────────────
export {
  RepositorySchema,
  type Repository,
  MergeableStatusSchema,
  type MergeableStatus,
  CiStatusSchema,
  type CiStatus,
  PullRequestStatusSchema,
  type PullRequestStatus,
  PullRequestSchema,
  type PullRequest,
  PrFilterSchema,
  type PrFilter,
} from './pull-request-schema'

// ── Build Logs ───────────────────────────────────────────────────────────────
export {
  JobStatusSchema,
  type JobStatus,
  JobMetadataSchema,
  type JobMetadata,
  JobLogInputSchema,
  type JobLogInput,
} from './build-log-schema'

// ── Session ──────────────────────────────────────────────────────────────────
export { SessionSchema, type Session } from './session-schema'
