export { createForge, resolveForgeSettings, type ForgeSettings } from './ForgeService'
export { loadReleasePipeline, type ReleasePipelineReport } from './PipelineService'
