import type {
  ForgeMergeRequest,
  ForgePipeline,
  ForgePipelineJob,
  ForgeProject,
  GitForgeAdapter
} from '@shared/types/git-forge'
import { Agent, request } from 'undici'
import { z } from 'zod'
import { ForgeError } from '../../../shared/errors'

/**
 * Shared HTTP agent with timeout configuration for GitLab API requests.
 */
const gitlabAgent = new Agent({
  connectTimeout: 10_000,
  headersTimeout: 30_000,
  bodyTimeout: 30_000
})

/** Per-request timeout for GitLab API calls */
const REQUEST_TIMEOUT_MS = 15_000

type ForgeOperation = ForgeError['operation']

const gitLabMergeRequestSchema = z.object({
  id: z.number(),
  iid: z.number(),
  project_id: z.number(),
  title: z.string(),
  description: z.string().nullable().optional(),
  state: z.enum(['opened', 'closed', 'merged', 'locked']),
  source_branch: z.string(),
  target_branch: z.string(),
  web_url: z.string(),
  created_at: z.string(),
  sha: z.string().nullable().optional()
})

type GitLabMergeRequest = z.infer<typeof gitLabMergeRequestSchema>

const gitLabEmailsSchema = z.array(z.object({ email: z.string() }))

const gitLabPipelineSchema = z.object({
  id: z.number(),
  sha: z.string(),
  ref: z.string(),
  status: z.string(),
  web_url: z.string(),
  created_at: z.string()
})

type GitLabPipeline = z.infer<typeof gitLabPipelineSchema>

const gitLabJobSchema = z.object({
  id: z.number(),
  name: z.string(),
  stage: z.string(),
  status: z.string(),
  web_url: z.string()
})

const gitLabProjectSchema = z.object({
  id: z.number(),
  name: z.string(),
  path_with_namespace: z.string(),
  web_url: z.string()
})

export class GitLabAdapter implements GitForgeAdapter {
  private readonly baseUrl: string

  constructor(
    baseUrl: string,
    private readonly token: string
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '')
  }

  async createMergeRequest(
    projectId: number,
    sourceBranch: string,
    targetBranch: string,
    title: string,
    description: string
  ): Promise<ForgeMergeRequest> {
    const { body, statusCode } = await this.send('create-mr', 'POST', `/projects/${projectId}/merge_requests`, {
      source_branch: sourceBranch,
      target_branch: targetBranch,
      title,
      description
    })

    if (statusCode !== 201) {
      const text = await body.text()
      throw new ForgeError(this.parseGitLabError(statusCode, text), 'create-mr', statusCode)
    }

    return this.mapMergeRequest(await this.parse(body, gitLabMergeRequestSchema, 'create-mr'))
  }

  async getMergeRequest(projectId: number, iid: number): Promise<ForgeMergeRequest> {
    const { body, statusCode } = await this.send(
      'fetch-mr',
      'GET',
      `/projects/${projectId}/merge_requests/${iid}`
    )

    if (statusCode === 404) {
      await body.text()
      throw new ForgeError(`Merge request !${iid} not found in project ${projectId}`, 'fetch-mr', 404)
    }
    if (statusCode !== 200) {
      const text = await body.text()
      throw new ForgeError(this.parseGitLabError(statusCode, text), 'fetch-mr', statusCode)
    }

    return this.mapMergeRequest(await this.parse(body, gitLabMergeRequestSchema, 'fetch-mr'))
  }

  async listOpenMergeRequests(projectId: number): Promise<ForgeMergeRequest[]> {
    const mrs = await this.getJson(
      'fetch-mrs',
      `/projects/${projectId}/merge_requests?state=opened&per_page=100`,
      z.array(gitLabMergeRequestSchema)
    )
    return mrs.map((mr) => this.mapMergeRequest(mr))
  }

  async listAllOpenMergeRequests(): Promise<ForgeMergeRequest[]> {
    const mrs = await this.getJson(
      'fetch-mrs',
      '/merge_requests?state=opened&scope=all&per_page=100',
      z.array(gitLabMergeRequestSchema)
    )
    return mrs.map((mr) => this.mapMergeRequest(mr))
  }

  async findMergeRequestBySourceBranch(
    projectId: number,
    sourceBranch: string
  ): Promise<ForgeMergeRequest> {
    const branch = encodeURIComponent(sourceBranch)
    const query = `source_branch=${branch}&order_by=updated_at&sort=desc&per_page=1`
    const [mr] = await this.getJson(
      'fetch-mr',
      `/projects/${projectId}/merge_requests?${query}`,
      z.array(gitLabMergeRequestSchema)
    )
    if (!mr) {
      throw new ForgeError(`No merge request found for branch ${sourceBranch}`, 'fetch-mr', 404)
    }
    return this.mapMergeRequest(mr)
  }

  async listMergeRequestPipelines(projectId: number, iid: number): Promise<ForgePipeline[]> {
    const pipelines = await this.getJson(
      'fetch-pipelines',
      `/projects/${projectId}/merge_requests/${iid}/pipelines`,
      z.array(gitLabPipelineSchema)
    )
    return pipelines.map((pipeline) => this.mapPipeline(pipeline))
  }

  async listPipelinesForCommit(projectId: number, sha: string): Promise<ForgePipeline[]> {
    const pipelines = await this.getJson(
      'fetch-pipelines',
      `/projects/${projectId}/pipelines?sha=${encodeURIComponent(sha)}`,
      z.array(gitLabPipelineSchema)
    )
    return pipelines.map((pipeline) => this.mapPipeline(pipeline))
  }

  async listPipelineJobs(projectId: number, pipelineId: number): Promise<ForgePipelineJob[]> {
    const jobs = await this.getJson(
      'fetch-jobs',
      `/projects/${projectId}/pipelines/${pipelineId}/jobs?per_page=100`,
      z.array(gitLabJobSchema)
    )
    return jobs.map((job) => ({
      id: job.id,
      name: job.name,
      stage: job.stage,
      status: job.status,
      webUrl: job.web_url
    }))
  }

  async listProjects(): Promise<ForgeProject[]> {
    const projects = await this.getJson(
      'fetch-projects',
      '/projects?membership=true&per_page=100&order_by=last_activity_at',
      z.array(gitLabProjectSchema)
    )
    return projects.map((project) => ({
      id: project.id,
      name: project.name,
      pathWithNamespace: project.path_with_namespace,
      webUrl: project.web_url
    }))
  }

  async getUserEmails(): Promise<string[]> {
    const { body, statusCode } = await this.send('fetch-emails', 'GET', '/user/emails')

    if (statusCode === 401) {
      await body.text()
      throw new ForgeError('Invalid token: authentication failed', 'fetch-emails', 401)
    }
    if (statusCode !== 200) {
      const text = await body.text()
      throw new ForgeError(this.parseGitLabError(statusCode, text), 'fetch-emails', statusCode)
    }

    const emails = await this.parse(body, gitLabEmailsSchema, 'fetch-emails')
    return emails.map((entry) => entry.email)
  }

  async validateCredentials(email: string): Promise<void> {
    const emails = await this.getUserEmails()
    const wanted = email.trim().toLowerCase()
    if (!emails.some((candidate) => candidate.toLowerCase() === wanted)) {
      throw new ForgeError(`Email '${email}' not found in your GitLab account`, 'validate')
    }
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private async send(
    operation: ForgeOperation,
    method: 'GET' | 'POST',
    path: string,
    payload?: Record<string, unknown>
  ) {
    const url = `${this.baseUrl}/api/v4${path}`
    try {
      return await request(url, {
        method,
        dispatcher: gitlabAgent,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        headers: {
          'PRIVATE-TOKEN': this.token,
          Accept: 'application/json',
          ...(payload ? { 'Content-Type': 'application/json' } : {})
        },
        body: payload ? JSON.stringify(payload) : undefined
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ForgeError(`Network error calling GitLab: ${reason}`, operation, undefined, error)
    }
  }

  /**
   * GET expecting 200 and a payload matching `schema`.
   */
  private async getJson<T>(
    operation: ForgeOperation,
    path: string,
    schema: z.ZodType<T>
  ): Promise<T> {
    const { body, statusCode } = await this.send(operation, 'GET', path)

    if (statusCode !== 200) {
      const text = await body.text()
      throw new ForgeError(this.parseGitLabError(statusCode, text), operation, statusCode)
    }

    return this.parse(body, schema, operation)
  }

  private async parse<T>(
    body: { json(): Promise<unknown> },
    schema: z.ZodType<T>,
    operation: ForgeOperation
  ): Promise<T> {
    let data: unknown
    try {
      data = await body.json()
    } catch (error) {
      throw new ForgeError('Failed to parse GitLab response', operation, undefined, error)
    }

    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      throw new ForgeError(
        `Unexpected GitLab response: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
        operation,
        undefined,
        parsed.error
      )
    }
    return parsed.data
  }

  private mapMergeRequest(mr: GitLabMergeRequest): ForgeMergeRequest {
    return {
      id: mr.id,
      iid: mr.iid,
      projectId: mr.project_id,
      title: mr.title,
      description: mr.description ?? '',
      state: mr.state,
      sourceBranch: mr.source_branch,
      targetBranch: mr.target_branch,
      webUrl: mr.web_url,
      createdAt: mr.created_at,
      ...(mr.sha ? { headSha: mr.sha } : {})
    }
  }

  private mapPipeline(pipeline: GitLabPipeline): ForgePipeline {
    return {
      id: pipeline.id,
      sha: pipeline.sha,
      ref: pipeline.ref,
      status: pipeline.status,
      webUrl: pipeline.web_url,
      createdAt: pipeline.created_at
    }
  }

  /**
   * Turns a GitLab error body into a readable message.
   * GitLab reports errors as `{ message }` (string, list or field map) or `{ error }`.
   */
  private parseGitLabError(statusCode: number, text: string): string {
    if (statusCode === 403 && text.includes('insufficient_scope')) {
      return "Token lacks 'api' scope - regenerate your GitLab token with 'api' scope enabled"
    }
    if (statusCode === 401) {
      return 'Invalid token: authentication failed'
    }

    let detail = text.trim()
    try {
      const parsed: unknown = JSON.parse(text)
      detail = this.describeErrorBody(parsed) ?? detail
    } catch {
      // Not JSON; keep the raw body
    }

    return `GitLab API error: status ${statusCode}${detail ? `, ${detail}` : ''}`
  }

  private describeErrorBody(parsed: unknown): string | undefined {
    if (typeof parsed !== 'object' || parsed === null) {
      return undefined
    }
    const message = 'message' in parsed ? parsed.message : 'error' in parsed ? parsed.error : undefined
    if (typeof message === 'string') {
      return message
    }
    if (Array.isArray(message)) {
      return message.map(String).join('; ')
    }
    if (typeof message === 'object' && message !== null) {
      return Object.entries(message)
        .map(([field, value]) => `${field} ${Array.isArray(value) ? value.join(', ') : String(value)}`)
        .join('; ')
    }
    return undefined
  }
}
