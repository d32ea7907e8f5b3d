/**
 * Wiring of the engine for one CLI invocation.
 */

import type { GitForgeAdapter } from '@shared/types'
import { getCommandRunner } from '../node/adapters/git'
import { loadConfiguration, type Configuration } from '../node/core/config'
import { FileHistoryStore, type IHistoryStore } from '../node/core/history-store'
import { FileReleaseSessionStore } from '../node/core/release-session-store'
import { captureThemeSnapshot } from '../node/core/theme'
import { ReleaseExecutor } from '../node/operations/ReleaseExecutor'
import { createForge, resolveForgeSettings } from '../node/services'
import { getConfigStore, type ConfigStore } from '../node/store'
import { ValidationError } from '../node/shared/errors'

export type CliContext = {
  configuration: Configuration
  configStore: ConfigStore
  historyStore: IHistoryStore
  executor: ReleaseExecutor
  forge: GitForgeAdapter | null
  /** Forge, or a ValidationError explaining how to configure one. */
  requireForge(): GitForgeAdapter
}

export function createCliContext(): CliContext {
  const configuration = loadConfiguration()
  const configStore = getConfigStore()
  const historyStore = new FileHistoryStore(configuration.dataDir)
  const forge = createForge(resolveForgeSettings(configuration, configStore))

  const executor = new ReleaseExecutor({
    runner: getCommandRunner(),
    sessionStore: new FileReleaseSessionStore(configuration.dataDir),
    historyStore,
    forge: forge ?? undefined,
    captureTheme: () => captureThemeSnapshot(configStore.getActiveTheme())
  })

  return {
    configuration,
    configStore,
    historyStore,
    executor,
    forge,
    requireForge() {
      if (!forge) {
        throw new ValidationError(
          'GitLab is not configured: set GITLAB_TOKEN and GITLAB_URL (or `relix config set-url`)'
        )
      }
      return forge
    }
  }
}
