/**
 * Build log tree — `Workflow → Job → Step → LogLine`.
 *
 * Nodes are immutable. `errorCount` and `hasFailures` are computed once by the
 * constructors below from the node's children, so a node's aggregate is always
 * the sum / OR of its children's. Trees are rebuilt wholesale when new logs
 * arrive; nothing in this module mutates an existing node.
 *
 * @module Log Navigator
 */
import type { JobLogInput, JobMetadata } from '@/types'
import { type LineLevel, parseJobLog } from './parser'

/** @category Log Navigator */
export interface LogLineNode {
  readonly kind: 'line'
  readonly text: string
  readonly timestamp: string | null
  readonly level: LineLevel
  readonly isError: boolean
  readonly errorCount: number
  readonly hasFailures: boolean
}

/** @category Log Navigator */
export interface StepNode {
  readonly kind: 'step'
  readonly name: string
  readonly lines: readonly LogLineNode[]
  readonly errorCount: number
  readonly hasFailures: boolean
}

/** @category Log Navigator */
export interface JobNode {
  readonly kind: 'job'
  readonly name: string
  readonly steps: readonly StepNode[]
  readonly errorCount: number
  readonly hasFailures: boolean
}

/** @category Log Navigator */
export interface WorkflowNode {
  readonly kind: 'workflow'
  readonly name: string
  readonly jobs: readonly JobNode[]
  readonly errorCount: number
  readonly hasFailures: boolean
}

/**
 * The forest root. Addressed by the empty path; never rendered as a row.
 *
 * @category Log Navigator
 */
export interface LogTree {
  readonly kind: 'root'
  readonly workflows: readonly WorkflowNode[]
  readonly errorCount: number
  readonly hasFailures: boolean
}

/** @category Log Navigator */
export type LogNode = LogTree | WorkflowNode | JobNode | StepNode | LogLineNode

interface Aggregate {
  readonly errorCount: number
  readonly hasFailures: boolean
}

function aggregate(children: readonly Aggregate[]): Aggregate {
  let errorCount = 0
  let hasFailures = false
  for (const child of children) {
    errorCount += child.errorCount
    hasFailures = hasFailures || child.hasFailures
  }
  return { errorCount, hasFailures }
}

// ── Constructors ─────────────────────────────────────────────────────────────

export function makeLine(
  text: string,
  options: { isError?: boolean; level?: LineLevel; timestamp?: string | null } = {},
): LogLineNode {
  const isError = options.isError ?? options.level === 'error'
  return {
    kind: 'line',
    text,
    timestamp: options.timestamp ?? null,
    level: options.level ?? (isError ? 'error' : 'info'),
    isError,
    errorCount: isError ? 1 : 0,
    hasFailures: isError,
  }
}

export function makeStep(name: string, lines: readonly LogLineNode[]): StepNode {
  return { kind: 'step', name, lines, ...aggregate(lines) }
}

export function makeJob(name: string, steps: readonly StepNode[]): JobNode {
  return { kind: 'job', name, steps, ...aggregate(steps) }
}

export function makeWorkflow(name: string, jobs: readonly JobNode[]): WorkflowNode {
  return { kind: 'workflow', name, jobs, ...aggregate(jobs) }
}

export function makeTree(workflows: readonly WorkflowNode[]): LogTree {
  return { kind: 'root', workflows, ...aggregate(workflows) }
}

/** Ordered children of any node; log lines have none. */
export function childrenOf(node: LogNode): readonly LogNode[] {
  switch (node.kind) {
    case 'root':
      return node.workflows
    case 'workflow':
      return node.jobs
    case 'job':
      return node.steps
    case 'step':
      return node.lines
    case 'line':
      return []
    default: {
      const exhaustive: never = node
      return exhaustive
    }
  }
}

/** Key under which a job's metadata is stored in the log panel. */
export function jobKey(workflowName: string, jobName: string): string {
  return `${workflowName}:${jobName}`
}

// ── Building from forge input ────────────────────────────────────────────────

const byName = (a: { name: string }, b: { name: string }) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0

/**
 * Parses every job log and groups the jobs into workflows.
 *
 * Jobs whose log is empty and whose name contains `/system` (runner
 * bookkeeping entries) are dropped. Workflows are ordered failing first, then
 * by name; jobs within a workflow by name; steps keep log order.
 *
 * @returns The tree and the job metadata keyed by {@link jobKey}.
 * @category Log Navigator
 */
export function buildLogTree(inputs: readonly JobLogInput[]): {
  tree: LogTree
  metadata: ReadonlyMap<string, JobMetadata>
} {
  const grouped = new Map<string, JobNode[]>()
  const metadata = new Map<string, JobMetadata>()

  for (const input of inputs) {
    const { workflowName, jobName } = input.metadata
    const steps = parseJobLog(input.log).map((step) =>
      makeStep(
        step.name,
        step.lines.map((line) =>
          makeLine(line.text, {
            isError: line.isError,
            level: line.level,
            timestamp: line.timestamp,
          }),
        ),
      ),
    )
    if (steps.every((s) => s.lines.length === 0) && jobName.includes('/system')) {
      continue
    }
    const jobs = grouped.get(workflowName) ?? []
    jobs.push(makeJob(jobName, steps))
    grouped.set(workflowName, jobs)
    metadata.set(jobKey(workflowName, jobName), input.metadata)
  }

  const workflows = [...grouped.entries()]
    .map(([name, jobs]) => makeWorkflow(name, [...jobs].sort(byName)))
    .sort((a, b) =>
      a.hasFailures === b.hasFailures ? byName(a, b) : a.hasFailures ? -1 : 1,
    )

  return { tree: makeTree(workflows), metadata }
}
