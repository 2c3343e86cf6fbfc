import { z } from 'zod'
import { ResultAsync, errAsync, okAsync } from 'neverthrow'
import { ForgeProvider, type RebaseRequest, type RequestOptions } from '@/core/forge/base'
import { isDependabot } from '@/core/pull-requests'
import { ForgeError, type ForgeErrorKind } from '@/errors'
import type {
  CiStatus,
  JobLogInput,
  JobStatus,
  MergeableStatus,
  MergeMethod,
  PullRequest,
  PullRequestStatus,
  Repository,
} from '@/types'
import { execFileNoThrow, type ExecOptions, type ExecResult } from '@/utils/execFileNoThrow'
import { createLimiter, type Limiter } from '@/utils/limiter'
import { createLogger } from '@/utils/logger'

const logger = createLogger('github')

/**
 * Injectable subprocess function matching the {@link execFileNoThrow} signature.
 * Pass a mock in tests to avoid real `gh` CLI network calls without process-global patching.
 *
 * @category Forge
 */
export type SpawnFn = (file: string, args?: string[], options?: ExecOptions) => Promise<ExecResult>

/** Parallel `gh` calls per provider. */
const GH_CONCURRENCY = 4

const GHPullSchema = z.object({
  number: z.number(),
  title: z.string(),
  user: z.object({ login: z.string() }),
  html_url: z.string(),
  comments: z.number().optional(),
  created_at: z.string(),
  updated_at: z.string(),
  head: z.object({ sha: z.string() }),
  merged: z.boolean().optional(),
  mergeable_state: z.string().optional(),
})
type GHPull = z.infer<typeof GHPullSchema>

const GHCheckRunsSchema = z.object({
  check_runs: z.array(
    z.object({
      status: z.string(),
      conclusion: z.string().nullable(),
    }),
  ),
})

const GHWorkflowRunsSchema = z.object({
  workflow_runs: z.array(
    z.object({
      id: z.number(),
      name: z.string().nullable(),
      status: z.string().nullable(),
      conclusion: z.string().nullable(),
    }),
  ),
})

const GHJobsSchema = z.object({
  jobs: z.array(
    z.object({
      id: z.number(),
      name: z.string(),
      status: z.string(),
      conclusion: z.string().nullable(),
      started_at: z.string().nullable(),
      completed_at: z.string().nullable(),
      html_url: z.string().nullable(),
    }),
  ),
})
type GHJob = z.infer<typeof GHJobsSchema>['jobs'][number]

const FAILED_CONCLUSIONS = new Set(['failure', 'cancelled', 'timed_out', 'action_required'])

/**
 * Folds the check runs of a commit into one status: any failed run fails the
 * commit, otherwise any unfinished run keeps it pending.
 */
export function ciStatusOf(runs: readonly { status: string; conclusion: string | null }[]): CiStatus {
  if (runs.length === 0) {
    return 'none'
  }
  if (runs.some((run) => run.conclusion !== null && FAILED_CONCLUSIONS.has(run.conclusion))) {
    return 'failure'
  }
  if (runs.some((run) => run.status !== 'completed' || run.conclusion === null)) {
    return 'pending'
  }
  return 'success'
}

/** Combines GitHub's `mergeable_state` with the CI status. */
export function mergeableStatusOf(mergeableState: string | undefined, ci: CiStatus): MergeableStatus {
  switch (mergeableState) {
    case 'dirty':
      return 'conflicted'
    case 'behind':
      return 'needsRebase'
  }
  if (ci === 'failure') {
    return 'buildFailed'
  }
  if (ci === 'pending') {
    return 'buildInProgress'
  }
  switch (mergeableState) {
    case 'blocked':
    case 'draft':
      return 'blocked'
    case 'clean':
    case 'unstable':
    case 'has_hooks':
      return 'ready'
    default:
      return 'unknown'
  }
}

function jobStatusOf(job: GHJob): JobStatus {
  if (job.status !== 'completed') {
    return 'inProgress'
  }
  switch (job.conclusion) {
    case 'success':
    case 'neutral':
      return 'success'
    case 'failure':
    case 'timed_out':
    case 'action_required':
      return 'failure'
    case 'cancelled':
      return 'cancelled'
    case 'skipped':
      return 'skipped'
    default:
      return 'unknown'
  }
}

function durationOf(job: GHJob): number | null {
  if (!job.started_at || !job.completed_at) {
    return null
  }
  const ms = Date.parse(job.completed_at) - Date.parse(job.started_at)
  return Number.isNaN(ms) || ms < 0 ? null : ms
}

/** Classifies a failed `gh` invocation from its exit status and stderr. */
export function classifyGhFailure(result: ExecResult): ForgeErrorKind {
  const text = result.stderr
  if (/rate limit|HTTP 429/i.test(text)) {
    return 'rate-limited'
  }
  if (/HTTP 401|Bad credentials|gh auth login/i.test(text)) {
    return 'auth-failed'
  }
  if (/HTTP 404|Not Found/i.test(text)) {
    return 'not-found'
  }
  if (/HTTP 40[59]|HTTP 422|conflict|not mergeable/i.test(text)) {
    return 'conflict'
  }
  return 'network'
}

function slug(repository: Repository): string {
  return `${repository.org}/${repository.repo}`
}

/**
 * GitHub provider. Shells out to the authenticated `gh` CLI (`gh api …`).
 *
 * **Prerequisites:** The `gh` CLI must be authenticated (`gh auth login`).
 *
 * **Rebasing:** Dependabot pull requests are rebased by commenting
 * `@dependabot rebase` (`@dependabot recreate` when conflicted); every other
 * pull request through `PUT /pulls/{n}/update-branch`.
 *
 * **Testing:** Pass a `spawnFn` to inject a mock `gh` implementation in tests.
 *
 * @category Forge
 */
export class GitHubForgeProvider extends ForgeProvider {
  private token: string = ''
  private spawnFile: SpawnFn
  private limit: Limiter

  constructor(
    private ghBinary: string = 'gh',
    spawnFn?: SpawnFn,
  ) {
    super()
    this.spawnFile = spawnFn ?? execFileNoThrow
    this.limit = createLimiter(GH_CONCURRENCY)
  }

  private ensureAuth(): ResultAsync<string, ForgeError> {
    if (this.token) {
      return okAsync(this.token)
    }
    return this.spawn(['auth', 'token']).andThen((result) => {
      if (result.status !== 0) {
        return errAsync(
          new ForgeError('auth-failed', `gh auth failed — run: gh auth login\n${result.stderr}`),
        )
      }
      this.token = result.stdout.trim()
      return okAsync(this.token)
    })
  }

  private spawn(args: string[], options?: RequestOptions): ResultAsync<ExecResult, ForgeError> {
    return ResultAsync.fromPromise(
      this.limit(
        () => this.spawnFile(this.ghBinary, args, { signal: options?.signal }),
        options?.signal,
      ),
      (e) => new ForgeError('network', e instanceof Error ? e.message : String(e), e),
    )
  }

  /** Runs `gh api` and returns its raw stdout. */
  private ghRaw(args: string[], options?: RequestOptions): ResultAsync<string, ForgeError> {
    return this.ensureAuth().andThen(() =>
      this.spawn(['api', ...args], options).andThen((result) => {
        if (result.status !== 0) {
          const kind = classifyGhFailure(result)
          logger.debug({ args, kind, stderr: result.stderr }, 'gh api failed')
          return errAsync(new ForgeError(kind, `gh api error: ${result.stderr.trim()}`))
        }
        return okAsync(result.stdout)
      }),
    )
  }

  private ghApi<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    args: string[],
    options?: RequestOptions,
  ): ResultAsync<T, ForgeError> {
    return this.ghRaw(args, options).andThen((stdout) => {
      let json: unknown
      try {
        json = JSON.parse(stdout)
      } catch (e) {
        return errAsync(new ForgeError('invalid-response', 'gh api returned invalid JSON', e))
      }
      const parsed = schema.safeParse(json)
      return parsed.success
        ? okAsync(parsed.data)
        : errAsync(new ForgeError('invalid-response', parsed.error.message, parsed.error))
    })
  }

  private fetchPull(
    repository: Repository,
    prNumber: number,
    options?: RequestOptions,
  ): ResultAsync<GHPull, ForgeError> {
    return this.ghApi(GHPullSchema, [`repos/${slug(repository)}/pulls/${prNumber}`], options)
  }

  private statusOf(
    repository: Repository,
    pull: GHPull,
    options?: RequestOptions,
  ): ResultAsync<PullRequestStatus, ForgeError> {
    return this.ghApi(
      GHCheckRunsSchema,
      [`repos/${slug(repository)}/commits/${pull.head.sha}/check-runs?per_page=100`],
      options,
    ).map((checks) => {
      const ciStatus = ciStatusOf(checks.check_runs)
      return {
        mergeable: mergeableStatusOf(pull.mergeable_state, ciStatus),
        ciStatus,
        behind: pull.mergeable_state === 'behind',
        merged: pull.merged ?? false,
        headSha: pull.head.sha,
      }
    })
  }

  listPullRequests(
    repository: Repository,
    options?: RequestOptions,
  ): ResultAsync<PullRequest[], ForgeError> {
    const base = encodeURIComponent(repository.branch)
    return this.ghApi(
      z.array(GHPullSchema),
      [`repos/${slug(repository)}/pulls?state=open&base=${base}&per_page=100`],
      options,
    ).andThen((pulls) =>
      ResultAsync.combine(
        pulls.map((summary) =>
          this.fetchPull(repository, summary.number, options).andThen((pull) =>
            this.statusOf(repository, pull, options).map(
              (status): PullRequest => ({
                number: pull.number,
                title: pull.title,
                author: pull.user.login,
                url: pull.html_url,
                comments: pull.comments ?? 0,
                createdAt: pull.created_at,
                updatedAt: pull.updated_at,
                status,
              }),
            ),
          ),
        ),
      ),
    )
  }

  fetchPullRequestStatus(
    repository: Repository,
    prNumber: number,
    options?: RequestOptions,
  ): ResultAsync<PullRequestStatus, ForgeError> {
    return this.fetchPull(repository, prNumber, options).andThen((pull) =>
      this.statusOf(repository, pull, options),
    )
  }

  private workflowRuns(repository: Repository, prNumber: number, options?: RequestOptions) {
    return this.fetchPull(repository, prNumber, options).andThen((pull) =>
      this.ghApi(
        GHWorkflowRunsSchema,
        [`repos/${slug(repository)}/actions/runs?head_sha=${pull.head.sha}&per_page=100`],
        options,
      ).map((runs) => runs.workflow_runs),
    )
  }

  private jobLog(
    repository: Repository,
    job: GHJob,
    options?: RequestOptions,
  ): ResultAsync<string, ForgeError> {
    return this.ghRaw([`repos/${slug(repository)}/actions/jobs/${job.id}/logs`], options).orElse(
      (e) => (e.kind === 'not-found' ? okAsync('') : errAsync(e)),
    )
  }

  fetchBuildLogs(
    repository: Repository,
    prNumber: number,
    options?: RequestOptions,
  ): ResultAsync<JobLogInput[], ForgeError> {
    return this.workflowRuns(repository, prNumber, options).andThen((runs) =>
      ResultAsync.combine(
        runs.map((run) =>
          this.ghApi(
            GHJobsSchema,
            [`repos/${slug(repository)}/actions/runs/${run.id}/jobs?per_page=100`],
            options,
          ).andThen(({ jobs }) =>
            ResultAsync.combine(
              jobs.map((job) =>
                this.jobLog(repository, job, options).map(
                  (log): JobLogInput => ({
                    log,
                    metadata: {
                      workflowName: run.name ?? `run ${run.id}`,
                      jobName: job.name,
                      status: jobStatusOf(job),
                      durationMs: durationOf(job),
                      htmlUrl: job.html_url ?? '',
                    },
                  }),
                ),
              ),
            ),
          ),
        ),
      ).map((perRun) => perRun.flat()),
    )
  }

  mergePullRequest(
    repository: Repository,
    prNumber: number,
    method: MergeMethod,
    options?: RequestOptions,
  ): ResultAsync<void, ForgeError> {
    return this.ghRaw(
      [
        '--method',
        'PUT',
        `repos/${slug(repository)}/pulls/${prNumber}/merge`,
        '-f',
        `merge_method=${method}`,
      ],
      options,
    ).map(() => undefined)
  }

  rebasePullRequest(request: RebaseRequest, options?: RequestOptions): ResultAsync<void, ForgeError> {
    const { repository, prNumber } = request
    if (isDependabot(request.author)) {
      const command = request.conflicted ? '@dependabot recreate' : '@dependabot rebase'
      return this.ghRaw(
        [
          '--method',
          'POST',
          `repos/${slug(repository)}/issues/${prNumber}/comments`,
          '-f',
          `body=${command}`,
        ],
        options,
      ).map(() => undefined)
    }
    return this.ghRaw(
      ['--method', 'PUT', `repos/${slug(repository)}/pulls/${prNumber}/update-branch`],
      options,
    ).map(() => undefined)
  }

  rerunFailedJobs(
    repository: Repository,
    prNumber: number,
    options?: RequestOptions,
  ): ResultAsync<void, ForgeError> {
    return this.workflowRuns(repository, prNumber, options).andThen((runs) =>
      ResultAsync.combine(
        runs
          .filter((run) => run.conclusion !== null && FAILED_CONCLUSIONS.has(run.conclusion))
          .map((run) =>
            this.ghRaw(
              ['--method', 'POST', `repos/${slug(repository)}/actions/runs/${run.id}/rerun-failed-jobs`],
              options,
            ),
          ),
      ).map(() => undefined),
    )
  }
}
