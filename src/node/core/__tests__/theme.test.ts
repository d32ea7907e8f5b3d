import type { ThemeColorSnapshot } from '@shared/types'
import { describe, expect, it } from 'vitest'
import {
  ANSI_RESET,
  ansiForeground,
  captureThemeSnapshot,
  isValidHexColor,
  outcomeTone,
  renderLog,
  renderLogEntry,
  resolveThemeColors
} from '../theme'

const markers: ThemeColorSnapshot = {
  accent: '<a>',
  success: '<s>',
  warning: '<w>',
  error: '<e>',
  foreground: '<f>'
}

describe('isValidHexColor', () => {
  it('accepts #RRGGBB only', () => {
    expect(isValidHexColor('#5f5FdF')).toBe(true)
    expect(isValidHexColor('#fff')).toBe(false)
    expect(isValidHexColor('5F5FDF')).toBe(false)
  })
})

describe('resolveThemeColors', () => {
  it('falls back to the default palette for missing and malformed colours', () => {
    expect(resolveThemeColors({ name: 'mine', accent: '#112233', error: 'red' })).toEqual({
      accent: '#112233',
      success: '#00D588',
      warning: '#FFD600',
      error: '#FF84A8',
      foreground: '#D7D7FF'
    })
  })
})

describe('ansiForeground', () => {
  it('builds a 24-bit escape sequence', () => {
    expect(ansiForeground('#5F5FDF')).toBe('\x1b[38;2;95;95;223m')
  })
})

describe('captureThemeSnapshot', () => {
  it('captures the default theme', () => {
    expect(captureThemeSnapshot()).toEqual({
      accent: '\x1b[38;2;95;95;223m',
      success: '\x1b[38;2;0;213;136m',
      warning: '\x1b[38;2;255;214;0m',
      error: '\x1b[38;2;255;132;168m',
      foreground: '\x1b[38;2;215;215;255m'
    })
  })
})

describe('outcomeTone', () => {
  it('groups outcomes by severity', () => {
    expect(outcomeTone('merge-ok')).toBe('success')
    expect(outcomeTone('merge-conflict')).toBe('warning')
    expect(outcomeTone('unrecoverable-state')).toBe('error')
  })
})

describe('renderLogEntry', () => {
  it('renders the header and indents the excerpt', () => {
    const rendered = renderLogEntry(
      {
        timestampMs: 1_000,
        step: 'merge-branches[1]',
        command: 'git merge origin/feature-b',
        outcome: 'merge-conflict',
        excerpt: 'CONFLICT (content): Merge conflict in cart.ts\n\nAutomatic merge failed'
      },
      markers
    )

    expect(rendered.split('\n')).toEqual([
      `<f>1970-01-01T00:00:01.000Z${ANSI_RESET} <a>[merge-branches[1]]${ANSI_RESET} <f>git merge origin/feature-b${ANSI_RESET} -> <w>merge-conflict${ANSI_RESET}`,
      `    <f>CONFLICT (content): Merge conflict in cart.ts${ANSI_RESET}`,
      `    <f>Automatic merge failed${ANSI_RESET}`
    ])
  })

  it('renders an entry without output as a single line', () => {
    const rendered = renderLogEntry(
      { timestampMs: 0, step: 'push', command: 'git push', outcome: 'pushed', excerpt: '' },
      markers
    )
    expect(rendered).toBe(
      `<f>1970-01-01T00:00:00.000Z${ANSI_RESET} <a>[push]${ANSI_RESET} <f>git push${ANSI_RESET} -> <s>pushed${ANSI_RESET}`
    )
  })
})

describe('renderLog', () => {
  it('joins entries in order', () => {
    const rendered = renderLog(
      [
        { timestampMs: 0, step: 'init', command: 'a', outcome: 'ok', excerpt: '' },
        { timestampMs: 0, step: 'abort', command: 'b', outcome: 'git-error', excerpt: '' }
      ],
      markers
    )
    expect(rendered.split('\n')).toHaveLength(2)
    expect(rendered).toContain(`<e>git-error${ANSI_RESET}`)
  })
})
