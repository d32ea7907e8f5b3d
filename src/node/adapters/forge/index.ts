/**
 * Forge Adapter Module
 *
 * Provides the adapter for the GitLab REST API.
 *
 * Usage:
 * ```typescript
 * const adapter = new GitLabAdapter('https://gitlab.example.com', token)
 * const mr = await adapter.getMergeRequest(42, 7)
 * ```
 */

export { GitLabAdapter } from './gitlab/GitLabAdapter'
