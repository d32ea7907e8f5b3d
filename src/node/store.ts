import Conf from 'conf'
import { parseExclusionPatterns } from './core/exclusion-applier'
import { DEFAULT_THEME_NAME, type ThemeConfig } from './core/theme'
import { DEFAULT_REMOTE } from './shared/constants'
import { ValidationError } from './shared/errors'

interface StoreSchema {
  gitlabUrl?: string
  remote: string
  excludePatterns: string[]
  themes: ThemeConfig[]
  selectedTheme: string
}

export type ConfigStoreOptions = {
  /**
   * Directory of the config file. Defaults to the platform config directory.
   */
  cwd?: string
}

export class ConfigStore {
  private store: Conf<StoreSchema>

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<StoreSchema>({
      projectName: 'relix',
      configName: 'config',
      cwd: options.cwd,
      defaults: {
        remote: DEFAULT_REMOTE,
        excludePatterns: [],
        themes: [],
        selectedTheme: DEFAULT_THEME_NAME
      }
    })
  }

  get path(): string {
    return this.store.path
  }

  getGitlabUrl(): string | undefined {
    return this.store.get('gitlabUrl')
  }

  setGitlabUrl(url: string): void {
    this.store.set('gitlabUrl', url.replace(/\/+$/, ''))
  }

  getRemote(): string {
    return this.store.get('remote', DEFAULT_REMOTE)
  }

  setRemote(remote: string): void {
    this.store.set('remote', remote)
  }

  getExcludePatterns(): string[] {
    return this.store.get('excludePatterns', [])
  }

  /**
   * Accepts newline-delimited text or a list; stores the normalized patterns.
   */
  setExcludePatterns(source: string | string[]): string[] {
    const patterns = parseExclusionPatterns(source)
    this.store.set('excludePatterns', patterns)
    return patterns
  }

  getThemes(): ThemeConfig[] {
    return this.store.get('themes', [])
  }

  saveTheme(theme: ThemeConfig): void {
    const others = this.getThemes().filter((existing) => existing.name !== theme.name)
    this.store.set('themes', [...others, theme])
  }

  getSelectedThemeName(): string {
    return this.store.get('selectedTheme', DEFAULT_THEME_NAME)
  }

  selectTheme(name: string): void {
    if (name !== DEFAULT_THEME_NAME && !this.getThemes().some((theme) => theme.name === name)) {
      throw new ValidationError(`Unknown theme '${name}'`, 'selectedTheme')
    }
    this.store.set('selectedTheme', name)
  }

  /**
   * The selected theme, or undefined for the built-in default.
   */
  getActiveTheme(): ThemeConfig | undefined {
    const name = this.getSelectedThemeName()
    return this.getThemes().find((theme) => theme.name === name)
  }
}

let instance: ConfigStore | null = null

export function getConfigStore(): ConfigStore {
  if (!instance) {
    instance = new ConfigStore()
  }
  return instance
}
