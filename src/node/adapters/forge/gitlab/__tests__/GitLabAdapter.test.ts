import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ForgeError } from '../../../../shared/errors'
import { GitLabAdapter } from '../GitLabAdapter'

// Mock undici's request function and Agent class
vi.mock('undici', () => {
  const MockAgent = function () {
    return {}
  }
  return {
    request: vi.fn(),
    Agent: MockAgent
  }
})

import { request } from 'undici'

const mockRequest = vi.mocked(request)

function respond(statusCode: number, payload: unknown, text = '') {
  mockRequest.mockResolvedValueOnce({
    statusCode,
    body: {
      json: async () => payload,
      text: async () => text
    }
  } as never)
}

const gitLabMergeRequest = {
  id: 900,
  iid: 90,
  project_id: 42,
  title: 'Release v1.2.0 (PROD) into master',
  description: null,
  state: 'opened',
  source_branch: 'release/v1.2.0-prod',
  target_branch: 'master',
  web_url: 'https://gitlab.example.com/shop/-/merge_requests/90',
  created_at: '2026-01-01T00:00:00Z'
}

describe('GitLabAdapter', () => {
  const token = 'test-token'
  let adapter: GitLabAdapter

  beforeEach(() => {
    vi.clearAllMocks()
    adapter = new GitLabAdapter('https://gitlab.example.com/', token)
  })

  afterEach(() => {
    vi.resetAllMocks()
  })

  describe('createMergeRequest', () => {
    it('posts the merge request and maps the response', async () => {
      respond(201, gitLabMergeRequest)

      const mr = await adapter.createMergeRequest(
        42,
        'release/v1.2.0-prod',
        'master',
        'Release v1.2.0 (PROD) into master',
        '## Release v1.2.0 (PROD)'
      )

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects/42/merge_requests',
        expect.objectContaining({
          method: 'POST',
          headers: expect.objectContaining({ 'PRIVATE-TOKEN': token }),
          body: JSON.stringify({
            source_branch: 'release/v1.2.0-prod',
            target_branch: 'master',
            title: 'Release v1.2.0 (PROD) into master',
            description: '## Release v1.2.0 (PROD)'
          })
        })
      )
      expect(mr).toEqual({
        id: 900,
        iid: 90,
        projectId: 42,
        title: 'Release v1.2.0 (PROD) into master',
        description: '',
        state: 'opened',
        sourceBranch: 'release/v1.2.0-prod',
        targetBranch: 'master',
        webUrl: 'https://gitlab.example.com/shop/-/merge_requests/90',
        createdAt: '2026-01-01T00:00:00Z'
      })
    })

    it('reports GitLab error messages', async () => {
      respond(
        409,
        null,
        JSON.stringify({ message: ['Another open merge request already exists for this source branch: !88'] })
      )

      await expect(
        adapter.createMergeRequest(42, 'release/v1.2.0-prod', 'master', 't', 'd')
      ).rejects.toThrow(
        'GitLab API error: status 409, Another open merge request already exists for this source branch: !88'
      )
    })

    it('explains a token without api scope', async () => {
      respond(403, null, '{"error":"insufficient_scope"}')

      await expect(adapter.createMergeRequest(42, 'a', 'b', 't', 'd')).rejects.toThrow(
        "Token lacks 'api' scope - regenerate your GitLab token with 'api' scope enabled"
      )
    })

    it('wraps network failures', async () => {
      mockRequest.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:443'))

      const error = await adapter
        .createMergeRequest(42, 'a', 'b', 't', 'd')
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(ForgeError)
      expect(error).toMatchObject({
        message: 'Network error calling GitLab: connect ECONNREFUSED 127.0.0.1:443',
        operation: 'create-mr'
      })
    })

    it('rejects unexpected payloads', async () => {
      respond(201, { id: 'not-a-number' })

      await expect(adapter.createMergeRequest(42, 'a', 'b', 't', 'd')).rejects.toThrow(
        /^Unexpected GitLab response/
      )
    })
  })

  describe('getMergeRequest', () => {
    it('fetches one merge request', async () => {
      respond(200, { ...gitLabMergeRequest, description: 'Adds checkout' })

      const mr = await adapter.getMergeRequest(42, 90)

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects/42/merge_requests/90',
        expect.objectContaining({ method: 'GET' })
      )
      expect(mr.description).toBe('Adds checkout')
    })

    it('reports a missing merge request', async () => {
      respond(404, null, '{"message":"404 Not found"}')

      await expect(adapter.getMergeRequest(42, 7)).rejects.toThrow(
        'Merge request !7 not found in project 42'
      )
    })
  })

  describe('listOpenMergeRequests', () => {
    it('requests opened merge requests', async () => {
      respond(200, [gitLabMergeRequest])

      const mrs = await adapter.listOpenMergeRequests(42)

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects/42/merge_requests?state=opened&per_page=100',
        expect.anything()
      )
      expect(mrs.map((mr) => mr.iid)).toEqual([90])
    })
  })

  describe('listAllOpenMergeRequests', () => {
    it('requests open merge requests of every project', async () => {
      respond(200, [gitLabMergeRequest, { ...gitLabMergeRequest, id: 501, iid: 5, project_id: 7 }])

      const mrs = await adapter.listAllOpenMergeRequests()

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/merge_requests?state=opened&scope=all&per_page=100',
        expect.objectContaining({ method: 'GET' })
      )
      expect(mrs.map((mr) => [mr.projectId, mr.iid])).toEqual([
        [42, 90],
        [7, 5]
      ])
    })

    it('reports GitLab errors with the fetch-mrs operation', async () => {
      respond(500, null, '{"message":"500 Internal Server Error"}')

      await expect(adapter.listAllOpenMergeRequests()).rejects.toMatchObject({
        message: 'GitLab API error: status 500, 500 Internal Server Error',
        operation: 'fetch-mrs',
        statusCode: 500
      })
    })
  })

  describe('findMergeRequestBySourceBranch', () => {
    it('asks for the most recently updated merge request of the branch', async () => {
      respond(200, [{ ...gitLabMergeRequest, state: 'merged', sha: 'c0ffee1' }])

      const mr = await adapter.findMergeRequestBySourceBranch(42, 'release/v1.2.0-prod')

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects/42/merge_requests' +
          '?source_branch=release%2Fv1.2.0-prod&order_by=updated_at&sort=desc&per_page=1',
        expect.anything()
      )
      expect(mr).toMatchObject({ iid: 90, state: 'merged', headSha: 'c0ffee1' })
    })

    it('fails when the branch has no merge request', async () => {
      respond(200, [])

      const error = await adapter
        .findMergeRequestBySourceBranch(42, 'release/v9.9.9-prod')
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(ForgeError)
      expect(error).toMatchObject({
        message: 'No merge request found for branch release/v9.9.9-prod',
        operation: 'fetch-mr',
        statusCode: 404
      })
    })
  })

  describe('pipelines', () => {
    const gitLabPipeline = {
      id: 7001,
      iid: 12,
      sha: 'c0ffee1',
      ref: 'release/v1.2.0-prod',
      status: 'running',
      source: 'merge_request_event',
      web_url: 'https://gitlab.example.com/shop/-/pipelines/7001',
      created_at: '2026-01-01T00:05:00Z'
    }

    it('lists the pipelines of a merge request', async () => {
      respond(200, [gitLabPipeline])

      const pipelines = await adapter.listMergeRequestPipelines(42, 90)

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects/42/merge_requests/90/pipelines',
        expect.objectContaining({ method: 'GET' })
      )
      expect(pipelines).toEqual([
        {
          id: 7001,
          sha: 'c0ffee1',
          ref: 'release/v1.2.0-prod',
          status: 'running',
          webUrl: 'https://gitlab.example.com/shop/-/pipelines/7001',
          createdAt: '2026-01-01T00:05:00Z'
        }
      ])
    })

    it('lists the pipelines of a commit', async () => {
      respond(200, [])

      await expect(adapter.listPipelinesForCommit(42, 'c0ffee1')).resolves.toEqual([])
      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects/42/pipelines?sha=c0ffee1',
        expect.anything()
      )
    })

    it('lists the jobs of a pipeline', async () => {
      respond(200, [
        {
          id: 9001,
          name: 'unit-tests',
          stage: 'test',
          status: 'failed',
          web_url: 'https://gitlab.example.com/shop/-/jobs/9001',
          duration: 42.5
        }
      ])

      const jobs = await adapter.listPipelineJobs(42, 7001)

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects/42/pipelines/7001/jobs?per_page=100',
        expect.anything()
      )
      expect(jobs).toEqual([
        {
          id: 9001,
          name: 'unit-tests',
          stage: 'test',
          status: 'failed',
          webUrl: 'https://gitlab.example.com/shop/-/jobs/9001'
        }
      ])
    })

    it('rejects a pipeline without a status', async () => {
      respond(200, [{ ...gitLabPipeline, status: undefined }])

      await expect(adapter.listMergeRequestPipelines(42, 90)).rejects.toMatchObject({
        operation: 'fetch-pipelines'
      })
    })
  })

  describe('listProjects', () => {
    it('lists member projects by recent activity', async () => {
      respond(200, [
        {
          id: 42,
          name: 'shop',
          path_with_namespace: 'acme/shop',
          web_url: 'https://gitlab.example.com/acme/shop',
          default_branch: 'master'
        }
      ])

      const projects = await adapter.listProjects()

      expect(mockRequest).toHaveBeenCalledWith(
        'https://gitlab.example.com/api/v4/projects?membership=true&per_page=100&order_by=last_activity_at',
        expect.anything()
      )
      expect(projects).toEqual([
        {
          id: 42,
          name: 'shop',
          pathWithNamespace: 'acme/shop',
          webUrl: 'https://gitlab.example.com/acme/shop'
        }
      ])
    })

    it('reports a token without api scope', async () => {
      respond(403, null, '{"error":"insufficient_scope"}')

      await expect(adapter.listProjects()).rejects.toMatchObject({
        message: "Token lacks 'api' scope - regenerate your GitLab token with 'api' scope enabled",
        operation: 'fetch-projects'
      })
    })
  })

  describe('validateCredentials', () => {
    it('accepts an email of the token owner, ignoring case', async () => {
      respond(200, [{ email: 'dev@example.com' }, { email: 'Release.Bot@example.com' }])

      await expect(adapter.validateCredentials('release.bot@example.com')).resolves.toBeUndefined()
    })

    it('rejects an unknown email', async () => {
      respond(200, [{ email: 'dev@example.com' }])

      await expect(adapter.validateCredentials('other@example.com')).rejects.toThrow(
        "Email 'other@example.com' not found in your GitLab account"
      )
    })

    it('rejects an invalid token', async () => {
      respond(401, null, '{"message":"401 Unauthorized"}')

      await expect(adapter.validateCredentials('dev@example.com')).rejects.toThrow(
        'Invalid token: authentication failed'
      )
    })
  })
})
