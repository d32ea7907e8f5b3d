/**
 * ForgeService - GitLab integration service
 *
 * Resolves GitLab settings from the environment and the config store and
 * builds the adapter the release engine and the CLI use.
 */

import { log } from '@shared/logger'
import type { GitForgeAdapter } from '@shared/types/git-forge'
import { GitLabAdapter } from '../adapters/forge'
import type { Configuration } from '../core/config'
import type { ConfigStore } from '../store'

export type ForgeSettings = {
  gitlabUrl?: string
  token?: string
}

/**
 * The environment wins over the stored URL; the token only comes from the
 * environment.
 */
export function resolveForgeSettings(
  configuration: Configuration,
  configStore: Pick<ConfigStore, 'getGitlabUrl'>
): ForgeSettings {
  return {
    gitlabUrl: configuration.gitlabUrl ?? configStore.getGitlabUrl(),
    token: configuration.gitlabToken
  }
}

/**
 * Returns null when the URL or the token is missing.
 */
export function createForge(settings: ForgeSettings): GitForgeAdapter | null {
  if (!settings.gitlabUrl || !settings.token) {
    log.debug('[ForgeService] GitLab is not configured (GITLAB_URL / GITLAB_TOKEN)')
    return null
  }
  return new GitLabAdapter(settings.gitlabUrl, settings.token)
}
