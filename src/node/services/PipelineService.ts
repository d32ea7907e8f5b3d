/**
 * PipelineService - CI state of a release merge request
 */

import { log } from '@shared/logger'
import type {
  ForgeMergeRequest,
  ForgePipeline,
  ForgePipelineJob,
  GitForgeAdapter
} from '@shared/types/git-forge'

export type ReleasePipelineReport = {
  mergeRequest: ForgeMergeRequest
  /** Latest pipeline, or null when none has run. */
  pipeline: ForgePipeline | null
  jobs: ForgePipelineJob[]
}

type PipelineForge = Pick<
  GitForgeAdapter,
  | 'findMergeRequestBySourceBranch'
  | 'listMergeRequestPipelines'
  | 'listPipelinesForCommit'
  | 'listPipelineJobs'
>

/**
 * Finds the merge request of `releaseBranch` and the jobs of its latest
 * pipeline. Falls back to the pipelines of the MR's head commit when the MR
 * itself has none, which is the case for branch pipelines.
 */
export async function loadReleasePipeline(
  forge: PipelineForge,
  projectId: number,
  releaseBranch: string
): Promise<ReleasePipelineReport> {
  const mergeRequest = await forge.findMergeRequestBySourceBranch(projectId, releaseBranch)

  let pipelines = await forge.listMergeRequestPipelines(projectId, mergeRequest.iid)
  if (pipelines.length === 0 && mergeRequest.headSha) {
    log.debug(`[PipelineService] !${mergeRequest.iid} has no MR pipeline, trying its head commit`)
    pipelines = await forge.listPipelinesForCommit(projectId, mergeRequest.headSha)
  }

  const [pipeline] = pipelines
  if (!pipeline) {
    return { mergeRequest, pipeline: null, jobs: [] }
  }

  const jobs = await forge.listPipelineJobs(projectId, pipeline.id)
  return { mergeRequest, pipeline, jobs }
}
