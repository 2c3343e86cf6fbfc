/**
 * Pull request model schemas — repositories, pull requests and their merge readiness.
 *
 * These are the values the forge provider hands to the engine. They are
 * validated once at the boundary and treated as immutable afterwards.
 *
 * @module pull-request-schema
 */
import { z } from 'zod'

/**
 * A repository tracked by the dashboard. `branch` is the base branch whose
 * open pull requests are listed.
 *
 * @category Pull Requests
 */
export const RepositorySchema = z.object({
  org: z.string().min(1),
  repo: z.string().min(1),
  branch: z.string().min(1).default('main'),
})
/** @category Pull Requests */
export type Repository = z.infer<typeof RepositorySchema>

/**
 * Merge readiness of a pull request, derived from GitHub's `mergeable_state`
 * combined with the check runs of the head commit.
 *
 * - `unknown` — not yet computed by GitHub
 * - `ready` — clean and CI green
 * - `needsRebase` — branch is behind its base
 * - `conflicted` — merge conflicts with the base
 * - `buildInProgress` — CI still running
 * - `buildFailed` — at least one check failed
 * - `blocked` — blocked by reviews or branch protection
 *
 * @category Pull Requests
 */
export const MergeableStatusSchema = z.enum([
  'unknown',
  'ready',
  'needsRebase',
  'conflicted',
  'buildInProgress',
  'buildFailed',
  'blocked',
])
/** @category Pull Requests */
export type MergeableStatus = z.infer<typeof MergeableStatusSchema>

/**
 * Aggregate CI state of the head commit.
 *
 * @category Pull Requests
 */
export const CiStatusSchema = z.enum(['success', 'failure', 'pending', 'none'])
/** @category Pull Requests */
export type CiStatus = z.infer<typeof CiStatusSchema>

/**
 * Point-in-time merge readiness of one pull request.
 *
 * @category Pull Requests
 */
export const PullRequestStatusSchema = z.object({
  mergeable: MergeableStatusSchema,
  ciStatus: CiStatusSchema,
  /** True when the head branch is behind the base branch. */
  behind: z.boolean(),
  /** True once GitHub reports the pull request as merged. */
  merged: z.boolean(),
  headSha: z.string(),
})
/** @category Pull Requests */
export type PullRequestStatus = z.infer<typeof PullRequestStatusSchema>

/**
 * An open pull request with its readiness attached.
 *
 * @category Pull Requests
 */
export const PullRequestSchema = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  author: z.string(),
  url: z.string(),
  comments: z.number().int().nonnegative().default(0),
  createdAt: z.string(),
  updatedAt: z.string(),
  status: PullRequestStatusSchema,
})
/** @category Pull Requests */
export type PullRequest = z.infer<typeof PullRequestSchema>

/**
 * Title filter cycled from the pull request table.
 *
 * @category Pull Requests
 */
export const PrFilterSchema = z.enum(['all', 'feat', 'fix', 'chore'])
/** @category Pull Requests */
export type PrFilter = z.infer<typeof PrFilterSchema>
