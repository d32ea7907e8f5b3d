import { randomBytes } from 'crypto'

/**
 * Creates a release session ID with the format `rel-{timestamp}-{random}`.
 */
export function createSessionId(nowMs: number = Date.now()): string {
  return `rel-${nowMs}-${randomBytes(3).toString('hex')}`
}
