import { InvalidArgumentError } from 'commander'

export function parseInteger(value: string): number {
  const parsed = Number(value.replace(/^!/, ''))
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`)
  }
  return parsed
}

export function collectInteger(value: string, previous: number[]): number[] {
  return [...previous, parseInteger(value)]
}

export function collectString(value: string, previous: string[]): string[] {
  return [...previous, value]
}
