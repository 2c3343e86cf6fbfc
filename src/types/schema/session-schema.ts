/**
 * Session schema — what prdash remembers between runs.
 *
 * Written to `{stateDir}/session.json` on shutdown and read back at bootstrap.
 * Every field is defaulted so a missing or partial file still yields a session.
 *
 * @module Configuration
 */
import { z } from 'zod'
import { ThemeNameSchema } from './config-schema'
import { PrFilterSchema, RepositorySchema } from './pull-request-schema'

/**
 * Persisted UI state.
 *
 * `selections` maps a repository key (`org/repo@branch`) to the pull request
 * numbers that were selected when the session was saved.
 *
 * @category Configuration
 */
export const SessionSchema = z.object({
  repositories: z.array(RepositorySchema).default([]),
  selectedRepository: z.number().int().nonnegative().default(0),
  filter: PrFilterSchema.default('all'),
  theme: ThemeNameSchema.optional(),
  selections: z.record(z.string(), z.array(z.number().int().positive())).default({}),
})
/** @category Configuration */
export type Session = z.infer<typeof SessionSchema>
