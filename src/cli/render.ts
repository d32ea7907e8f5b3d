/**
 * Plain-text rendering of sessions, run results and history for the terminal.
 */

import type {
  ForgeMergeRequest,
  ForgeProject,
  HistoryDetail,
  HistoryEntry,
  ReleaseSession,
  SuspensionReason,
  ThemeColorSnapshot
} from '@shared/types'
import { ANSI_RESET, renderLog } from '../node/core/theme'
import { ReleaseNaming } from '../node/domain'
import type { ReleaseRunResult } from '../node/operations/ReleaseExecutor'
import type { ReleasePipelineReport } from '../node/services'

export function renderRunResult(result: ReleaseRunResult, theme: ThemeColorSnapshot): string {
  const { session } = result
  const title = ReleaseNaming.releaseTitle(session.version, session.environment)

  switch (result.status) {
    case 'completed':
      return [
        paint(theme.success, `${title} completed`),
        session.mergeRequestUrl ? `Merge request: ${session.mergeRequestUrl}` : undefined,
        `Recorded as ${result.historyEntry.id}`
      ]
        .filter(isDefined)
        .join('\n')

    case 'aborted':
      return [
        paint(theme.warning, `${title} aborted`),
        ...(result.manualCleanupRequired
          ? [
              paint(theme.error, 'Rollback did not finish; manual cleanup required:'),
              ...result.cleanupFailures.map((failure) => `  ${failure}`)
            ]
          : ['Working copy restored']),
        `Recorded as ${result.historyEntry.id}`
      ].join('\n')

    case 'suspended':
      return renderSuspension(session, result.reason, theme)

    case 'failed':
      return [
        paint(theme.error, `${ReleaseNaming.stepLabel(session.currentStep)} failed (${result.failure.kind}):`),
        indent(result.failure.message),
        'Only `relix abort` is possible now.'
      ].join('\n')
  }
}

function renderSuspension(
  session: ReleaseSession,
  reason: SuspensionReason,
  theme: ThemeColorSnapshot
): string {
  switch (reason.kind) {
    case 'merge-conflict':
      return [
        paint(theme.warning, `Merge conflict while merging ${reason.branch}:`),
        ...reason.conflictedPaths.map((path) => `  ${path}`),
        'Resolve the conflicts in the working copy, then run `relix retry` (or `relix abort`).'
      ].join('\n')
    case 'push-rejected':
      return [
        paint(theme.warning, `Push of ${session.releaseBranch} was rejected:`),
        indent(reason.detail),
        'Fetch and rebase the release branch, then run `relix retry` (or `relix abort`).'
      ].join('\n')
    case 'remote-mr-failed':
      return [
        paint(theme.warning, 'Creating the release merge request failed:'),
        indent(reason.message),
        'The branch is pushed. Fix the cause, then run `relix retry`.'
      ].join('\n')
  }
}

export function renderSession(session: ReleaseSession): string {
  const lines = [
    `Release:     ${session.id}`,
    `Version:     ${ReleaseNaming.releaseTitle(session.version, session.environment)}`,
    `Branches:    ${session.releaseBranch} from ${session.remote}/${session.rootBranch}`,
    `Status:      ${session.status}`,
    `Step:        ${ReleaseNaming.stepLabel(session.currentStep)}`,
    'Merge requests:',
    ...session.mergeRequests.map((mr, index) => `  ${index + 1}. !${mr.iid} ${mr.title} (${mr.sourceBranch})`)
  ]

  if (session.suspension) {
    lines.push(`Suspended:   ${session.suspension.kind}`)
  }
  if (session.failure) {
    lines.push(`Failure:     ${session.failure.kind}: ${session.failure.message}`)
  }
  return lines.join('\n')
}

/**
 * Most recent first.
 */
export function renderHistoryIndex(entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return 'No releases recorded yet.'
  }

  return [...entries]
    .sort((a, b) => b.dateTimeMs - a.dateTimeMs)
    .map(
      (entry) =>
        `${new Date(entry.dateTimeMs).toISOString()}  ${entry.tag.padEnd(18)} ${entry.status.padEnd(9)} ${entry.mrCount} MR(s)  ${entry.id}`
    )
    .join('\n')
}

/**
 * Uses the colours stored with the record, not the current theme.
 */
export function renderHistoryDetail(detail: HistoryDetail): string {
  const { entry, theme } = detail
  return [
    paint(theme.accent, `${entry.tag} (${entry.status})`),
    `Release branch: ${detail.releaseBranch} -> ${detail.rootBranch}`,
    detail.mergeRequestUrl ? `Merge request:  ${detail.mergeRequestUrl}` : undefined,
    'Merge requests:',
    ...detail.mergeRequests.map((mr) => `  !${mr.iid} ${mr.title}`),
    '',
    renderLog(detail.log, theme)
  ]
    .filter(isDefined)
    .join('\n')
}

export function renderMergeRequests(mrs: ForgeMergeRequest[]): string {
  if (mrs.length === 0) {
    return 'No open merge requests.'
  }
  return mrs
    .map((mr) => `!${String(mr.iid).padEnd(5)} ${mr.sourceBranch} -> ${mr.targetBranch}  ${mr.title}`)
    .join('\n')
}

/**
 * Open MRs of several projects, each named by its full GitLab reference
 * (`group/project!iid`).
 */
export function renderAllMergeRequests(mrs: ForgeMergeRequest[]): string {
  if (mrs.length === 0) {
    return 'No open merge requests.'
  }
  const rows = mrs.map((mr) => ({
    reference: `${projectPath(mr.webUrl)}!${mr.iid}`,
    summary: `${mr.sourceBranch} -> ${mr.targetBranch}  ${mr.title}`
  }))
  const width = Math.max(...rows.map((row) => row.reference.length))
  return rows.map((row) => `${row.reference.padEnd(width)}  ${row.summary}`).join('\n')
}

export function renderProjects(projects: ForgeProject[]): string {
  if (projects.length === 0) {
    return 'No projects.'
  }
  return projects
    .map((project) => `${String(project.id).padEnd(8)} ${project.pathWithNamespace}`)
    .join('\n')
}

export function renderReleasePipeline(report: ReleasePipelineReport, theme: ThemeColorSnapshot): string {
  const { mergeRequest, pipeline, jobs } = report
  const lines = [
    paint(theme.accent, `!${mergeRequest.iid} ${mergeRequest.title}`),
    `State:    ${mergeRequest.state}`,
    `Branches: ${mergeRequest.sourceBranch} -> ${mergeRequest.targetBranch}`,
    `URL:      ${mergeRequest.webUrl}`
  ]

  if (!pipeline) {
    lines.push('No pipeline has run for this merge request.')
    return lines.join('\n')
  }

  lines.push(
    `Pipeline: #${pipeline.id} ${statusText(pipeline.status, theme)}`,
    `          ${pipeline.webUrl}`
  )
  if (jobs.length === 0) {
    lines.push('No jobs.')
    return lines.join('\n')
  }

  const stageWidth = Math.max(...jobs.map((job) => job.stage.length))
  const nameWidth = Math.max(...jobs.map((job) => job.name.length))
  lines.push(
    'Jobs:',
    ...jobs.map((job) => {
      const status = statusText(job.status, theme)
      return `  ${job.stage.padEnd(stageWidth)}  ${job.name.padEnd(nameWidth)}  ${status}`
    })
  )
  return lines.join('\n')
}

/**
 * `https://host/group/project/-/merge_requests/7` -> `group/project`
 */
function projectPath(webUrl: string): string {
  return webUrl.replace(/^[a-z]+:\/\/[^/]+\//i, '').replace(/\/-\/merge_requests\/\d+$/, '')
}

function statusText(status: string, theme: ThemeColorSnapshot): string {
  switch (status) {
    case 'success':
      return paint(theme.success, status)
    case 'failed':
      return paint(theme.error, status)
    case 'running':
    case 'pending':
      return paint(theme.warning, status)
    default:
      return status
  }
}

function paint(color: string, text: string): string {
  return `${color}${text}${ANSI_RESET}`
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n')
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined
}
