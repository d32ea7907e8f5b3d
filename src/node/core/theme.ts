/**
 * Theme snapshot
 *
 * Resolves the configured colour theme and captures it as ANSI escape
 * prefixes. A history record stores the snapshot taken when it was written,
 * and its log is always rendered with that snapshot, never the current theme.
 */

import type { ReleaseLogEntry, ThemeColorSnapshot } from '@shared/types'

export type ThemeConfig = {
  name: string
  accent?: string
  success?: string
  warning?: string
  error?: string
  foreground?: string
}

type ThemeColors = Required<Omit<ThemeConfig, 'name'>>

export const DEFAULT_THEME_NAME = 'indigo'

export const DEFAULT_THEME_COLORS: ThemeColors = {
  accent: '#5F5FDF',
  success: '#00D588',
  warning: '#FFD600',
  error: '#FF84A8',
  foreground: '#D7D7FF'
}

export const ANSI_RESET = '\x1b[0m'

const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/

export function isValidHexColor(value: string): boolean {
  return HEX_COLOR.test(value)
}

/**
 * Fills missing or malformed colours from the default theme.
 */
export function resolveThemeColors(theme?: ThemeConfig): ThemeColors {
  const pick = (value: string | undefined, fallback: string): string =>
    value !== undefined && isValidHexColor(value) ? value : fallback

  return {
    accent: pick(theme?.accent, DEFAULT_THEME_COLORS.accent),
    success: pick(theme?.success, DEFAULT_THEME_COLORS.success),
    warning: pick(theme?.warning, DEFAULT_THEME_COLORS.warning),
    error: pick(theme?.error, DEFAULT_THEME_COLORS.error),
    foreground: pick(theme?.foreground, DEFAULT_THEME_COLORS.foreground)
  }
}

/**
 * 24-bit foreground escape for a `#RRGGBB` colour.
 */
export function ansiForeground(hex: string): string {
  const r = parseInt(hex.slice(1, 3), 16)
  const g = parseInt(hex.slice(3, 5), 16)
  const b = parseInt(hex.slice(5, 7), 16)
  return `\x1b[38;2;${r};${g};${b}m`
}

export function captureThemeSnapshot(theme?: ThemeConfig): ThemeColorSnapshot {
  const colors = resolveThemeColors(theme)
  return {
    accent: ansiForeground(colors.accent),
    success: ansiForeground(colors.success),
    warning: ansiForeground(colors.warning),
    error: ansiForeground(colors.error),
    foreground: ansiForeground(colors.foreground)
  }
}

// ============================================================================
// Log Rendering
// ============================================================================

type Tone = 'success' | 'warning' | 'error'

const WARNING_OUTCOMES = new Set([
  'merge-conflict',
  'push-rejected',
  'remote-mr-failed',
  'no-merge-in-progress',
  'nothing-to-commit'
])

const ERROR_OUTCOMES = new Set([
  'git-error',
  'spawn-error',
  'branch-not-found',
  'unrecoverable-state'
])

export function outcomeTone(outcome: string): Tone {
  if (ERROR_OUTCOMES.has(outcome)) return 'error'
  if (WARNING_OUTCOMES.has(outcome)) return 'warning'
  return 'success'
}

/**
 * Renders one log entry: a header line followed by the indented excerpt.
 *
 * @example
 * renderLogEntry(entry, snapshot)
 * // 2026-03-01T10:00:00.000Z [merge-branches[1]] git merge --no-ff ... -> merge-conflict
 * //     CONFLICT (content): Merge conflict in cart.ts
 */
export function renderLogEntry(entry: ReleaseLogEntry, snapshot: ThemeColorSnapshot): string {
  const timestamp = new Date(entry.timestampMs).toISOString()
  const header =
    `${snapshot.foreground}${timestamp}${ANSI_RESET} ` +
    `${snapshot.accent}[${entry.step}]${ANSI_RESET} ` +
    `${snapshot.foreground}${entry.command}${ANSI_RESET} -> ` +
    `${snapshot[outcomeTone(entry.outcome)]}${entry.outcome}${ANSI_RESET}`

  const excerpt = entry.excerpt
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => `    ${snapshot.foreground}${line}${ANSI_RESET}`)

  return [header, ...excerpt].join('\n')
}

export function renderLog(entries: ReleaseLogEntry[], snapshot: ThemeColorSnapshot): string {
  return entries.map((entry) => renderLogEntry(entry, snapshot)).join('\n')
}
