import type { ResultAsync } from 'neverthrow'
import type { ForgeError } from '@/errors'
import type {
  JobLogInput,
  MergeMethod,
  PullRequest,
  PullRequestStatus,
  Repository,
} from '@/types'

/**
 * Per-call options. Aborting `signal` cancels the underlying request; the
 * result of a cancelled call is never dispatched.
 *
 * @category Forge
 */
export interface RequestOptions {
  signal?: AbortSignal
}

/**
 * A pull request a rebase applies to. `author` and `conflicted` decide how
 * the rebase is requested.
 *
 * @category Forge
 */
export interface RebaseRequest {
  repository: Repository
  prNumber: number
  author: string
  conflicted: boolean
}

/**
 * Abstract base for code forges the dashboard talks to.
 *
 * Concrete implementation: `GitHubForgeProvider`. Tests extend this class
 * with an in-memory fake.
 *
 * Every method returns a `ResultAsync` and never rejects; failures are a
 * typed {@link ForgeError}. The mutating operations must be safe to retry,
 * since the merge bot retries them after failures.
 *
 * @category Forge
 */
export abstract class ForgeProvider {
  // ── Abstract I/O — implemented per provider ───────────────────────────────

  /**
   * Lists open pull requests targeting `repository.branch`, each with its
   * current merge readiness.
   *
   * @group I/O — Override in Provider
   */
  abstract listPullRequests(
    repository: Repository,
    options?: RequestOptions,
  ): ResultAsync<PullRequest[], ForgeError>

  /**
   * Current merge readiness of one pull request.
   *
   * @group I/O — Override in Provider
   */
  abstract fetchPullRequestStatus(
    repository: Repository,
    prNumber: number,
    options?: RequestOptions,
  ): ResultAsync<PullRequestStatus, ForgeError>

  /**
   * Raw log text and metadata of every CI job that ran for the pull
   * request's head commit.
   *
   * @group I/O — Override in Provider
   */
  abstract fetchBuildLogs(
    repository: Repository,
    prNumber: number,
    options?: RequestOptions,
  ): ResultAsync<JobLogInput[], ForgeError>

  /** @group I/O — Override in Provider */
  abstract mergePullRequest(
    repository: Repository,
    prNumber: number,
    method: MergeMethod,
    options?: RequestOptions,
  ): ResultAsync<void, ForgeError>

  /**
   * Brings the head branch up to date with its base.
   *
   * @group I/O — Override in Provider
   */
  abstract rebasePullRequest(
    request: RebaseRequest,
    options?: RequestOptions,
  ): ResultAsync<void, ForgeError>

  /**
   * Re-runs the failed jobs of every failed workflow run of the head commit.
   *
   * @group I/O — Override in Provider
   */
  abstract rerunFailedJobs(
    repository: Repository,
    prNumber: number,
    options?: RequestOptions,
  ): ResultAsync<void, ForgeError>
}
