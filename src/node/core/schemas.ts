/**
 * Schemas for the files the engine reads back from disk.
 * Anything that does not parse is reported as corrupt rather than resumed.
 */

import { ENVIRONMENTS } from '@shared/types'
import type {
  HistoryDetail,
  HistoryEntry,
  MergeRequestRef,
  ReleaseLogEntry,
  ReleaseSession,
  ReleaseStep,
  ThemeColorSnapshot
} from '@shared/types'
import { z } from 'zod'

export const mergeRequestRefSchema: z.ZodType<MergeRequestRef> = z.object({
  projectId: z.number().int(),
  sourceBranch: z.string().min(1),
  targetBranch: z.string().min(1),
  iid: z.number().int(),
  title: z.string()
})

export const releaseStepSchema: z.ZodType<ReleaseStep> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('init') }),
  z.object({ kind: z.literal('checkout-root') }),
  z.object({ kind: z.literal('merge-branches'), index: z.number().int().nonnegative() }),
  z.object({ kind: z.literal('apply-exclusions') }),
  z.object({ kind: z.literal('commit') }),
  z.object({ kind: z.literal('push') }),
  z.object({ kind: z.literal('create-remote-mr') }),
  z.object({ kind: z.literal('done') })
])

export const releaseLogEntrySchema: z.ZodType<ReleaseLogEntry> = z.object({
  timestampMs: z.number(),
  step: z.string(),
  command: z.string(),
  outcome: z.string(),
  excerpt: z.string()
})

export const releaseSessionSchema: z.ZodType<ReleaseSession> = z.object({
  id: z.string().min(1),
  repoPath: z.string().min(1),
  projectId: z.number().int(),
  mergeRequests: z.array(mergeRequestRefSchema),
  environment: z.enum(ENVIRONMENTS),
  rootBranch: z.string().min(1),
  releaseBranch: z.string().min(1),
  remote: z.string().min(1),
  version: z.string(),
  excludePatterns: z.array(z.string()),
  currentStep: releaseStepSchema,
  status: z.enum(['active', 'suspended', 'completed', 'aborted', 'failed']),
  suspension: z
    .discriminatedUnion('kind', [
      z.object({
        kind: z.literal('merge-conflict'),
        branch: z.string(),
        conflictedPaths: z.array(z.string())
      }),
      z.object({ kind: z.literal('push-rejected'), detail: z.string() }),
      z.object({ kind: z.literal('remote-mr-failed'), message: z.string() })
    ])
    .optional(),
  failure: z
    .object({
      kind: z.enum(['git-error', 'spawn-error', 'branch-not-found']),
      message: z.string()
    })
    .optional(),
  preReleaseCommit: z.string().optional(),
  originalBranch: z.string().optional(),
  removedPaths: z.array(z.string()).optional(),
  commitSha: z.string().optional(),
  mergeRequestUrl: z.string().optional(),
  log: z.array(releaseLogEntrySchema),
  createdAtMs: z.number(),
  updatedAtMs: z.number(),
  finishedAtMs: z.number().optional()
})

export const historyEntrySchema: z.ZodType<HistoryEntry> = z.object({
  id: z.string().min(1),
  tag: z.string(),
  environment: z.enum(ENVIRONMENTS),
  dateTimeMs: z.number(),
  mrCount: z.number().int().nonnegative(),
  status: z.enum(['completed', 'aborted'])
})

export const historyIndexSchema = z.array(historyEntrySchema)

export const themeColorSnapshotSchema: z.ZodType<ThemeColorSnapshot> = z.object({
  accent: z.string(),
  success: z.string(),
  warning: z.string(),
  error: z.string(),
  foreground: z.string()
})

export const historyDetailSchema: z.ZodType<HistoryDetail> = z.object({
  entry: historyEntrySchema,
  version: z.string(),
  rootBranch: z.string(),
  releaseBranch: z.string(),
  mergeRequests: z.array(mergeRequestRefSchema),
  mergeRequestUrl: z.string().optional(),
  log: z.array(releaseLogEntrySchema),
  theme: themeColorSnapshotSchema
})
