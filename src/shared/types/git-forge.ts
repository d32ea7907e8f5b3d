export type ForgeMergeRequest = {
  id: number
  iid: number
  projectId: number
  title: string
  description: string
  state: 'opened' | 'closed' | 'merged' | 'locked'
  sourceBranch: string
  targetBranch: string
  webUrl: string
  createdAt: string
  /** Head commit of the source branch, when GitLab reports one. */
  headSha?: string
}

export type ForgeProject = {
  id: number
  name: string
  pathWithNamespace: string
  webUrl: string
}

/**
 * GitLab pipeline status: `created`, `pending`, `running`, `success`,
 * `failed`, `canceled`, `skipped`, `manual` or `scheduled`.
 */
export type ForgePipeline = {
  id: number
  sha: string
  ref: string
  status: string
  webUrl: string
  createdAt: string
}

export type ForgePipelineJob = {
  id: number
  name: string
  stage: string
  status: string
  webUrl: string
}

/**
 * The single code-host capability the release engine needs.
 */
export interface ReleaseForge {
  /**
   * Opens a merge request and resolves with it.
   * Rejects with ForgeError when the code host refuses.
   */
  createMergeRequest(
    projectId: number,
    sourceBranch: string,
    targetBranch: string,
    title: string,
    description: string
  ): Promise<ForgeMergeRequest>
}

export interface GitForgeAdapter extends ReleaseForge {
  /**
   * Fetches a single merge request. Used to resolve `!iid` references when a
   * release is started.
   */
  getMergeRequest(projectId: number, iid: number): Promise<ForgeMergeRequest>

  listOpenMergeRequests(projectId: number): Promise<ForgeMergeRequest[]>

  /**
   * Open merge requests across every project the token can see.
   */
  listAllOpenMergeRequests(): Promise<ForgeMergeRequest[]>

  /**
   * Most recently updated merge request of `sourceBranch`, in any state.
   * Rejects with ForgeError when the branch has none.
   */
  findMergeRequestBySourceBranch(projectId: number, sourceBranch: string): Promise<ForgeMergeRequest>

  /** Newest first. */
  listMergeRequestPipelines(projectId: number, iid: number): Promise<ForgePipeline[]>

  /** Newest first. */
  listPipelinesForCommit(projectId: number, sha: string): Promise<ForgePipeline[]>

  listPipelineJobs(projectId: number, pipelineId: number): Promise<ForgePipelineJob[]>

  /**
   * Projects the token's owner is a member of, most recently active first.
   */
  listProjects(): Promise<ForgeProject[]>

  getUserEmails(): Promise<string[]>

  /**
   * Checks that the token works and that `email` belongs to its owner.
   */
  validateCredentials(email: string): Promise<void>
}
