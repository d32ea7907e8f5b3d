const SEMVER_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/

/**
 * Accepts plain `X.Y.Z` versions without leading zeros, prefixes or suffixes.
 */
export function isValidVersion(version: string): boolean {
  return SEMVER_PATTERN.test(version)
}
