/**
 * Release Naming
 *
 * Deterministic names and messages derived from a release's version,
 * environment and merge requests.
 */

import type { Environment, MergeRequestRef, ReleaseStep } from '@shared/types'

export class ReleaseNaming {
  private constructor() {
    // Static-only class
  }

  /**
   * e.g. `v1.2.0-prod`
   */
  static tag(version: string, environment: Environment): string {
    return `v${version}-${environment.toLowerCase()}`
  }

  /**
   * e.g. `release/v1.2.0-prod`
   */
  static releaseBranch(version: string, environment: Environment): string {
    return `release/${ReleaseNaming.tag(version, environment)}`
  }

  /**
   * e.g. `Release v1.2.0 (PROD)`
   */
  static releaseTitle(version: string, environment: Environment): string {
    return `Release v${version} (${environment})`
  }

  /**
   * Summary line, a blank line, then one `- !<iid> <title>` line per merge
   * request in merge order.
   */
  static commitMessage(
    version: string,
    environment: Environment,
    mergeRequests: MergeRequestRef[]
  ): string {
    return [
      ReleaseNaming.releaseTitle(version, environment),
      '',
      ...ReleaseNaming.mergeRequestLines(mergeRequests)
    ].join('\n')
  }

  static mergeRequestTitle(version: string, environment: Environment, rootBranch: string): string {
    return `${ReleaseNaming.releaseTitle(version, environment)} into ${rootBranch}`
  }

  static mergeRequestDescription(
    version: string,
    environment: Environment,
    mergeRequests: MergeRequestRef[]
  ): string {
    return [
      `## ${ReleaseNaming.releaseTitle(version, environment)}`,
      '',
      'Included merge requests:',
      '',
      ...ReleaseNaming.mergeRequestLines(mergeRequests)
    ].join('\n')
  }

  /**
   * Label used in log entries, e.g. `merge-branches[1]`.
   */
  static stepLabel(step: ReleaseStep): string {
    return step.kind === 'merge-branches' ? `merge-branches[${step.index}]` : step.kind
  }

  private static mergeRequestLines(mergeRequests: MergeRequestRef[]): string[] {
    return mergeRequests.map((mr) => `- !${mr.iid} ${mr.title}`)
  }
}
