import dotenv from 'dotenv'
import os from 'os'
import path from 'path'

dotenv.config()

export type Configuration = {
  /** Directory holding the session file and the history archive. */
  dataDir: string
  gitlabUrl?: string
  gitlabToken?: string
}

/**
 * Reads the environment (after `.env` has been applied).
 *
 * - `RELIX_HOME`: data directory, default `~/.relix`
 * - `GITLAB_URL`: GitLab base URL, overrides the stored setting
 * - `GITLAB_TOKEN`: personal access token with `api` scope
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
  const home = env.RELIX_HOME?.trim()

  return {
    dataDir: home ? path.resolve(home) : path.join(os.homedir(), '.relix'),
    gitlabUrl: nonEmpty(env.GITLAB_URL),
    gitlabToken: nonEmpty(env.GITLAB_TOKEN)
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}
