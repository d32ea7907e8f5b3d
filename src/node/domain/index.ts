/**
 * Domain Layer - Pure business logic with no I/O dependencies.
 *
 * All classes in this module are pure - they contain only synchronous functions
 * that operate on data without side effects. For git and GitLab calls, see the
 * operations layer.
 */

export { ReleaseNaming } from './ReleaseNaming'
export { ReleaseStateMachine } from './ReleaseStateMachine'
export type {
  AdvanceParams,
  CanAcceptOptions,
  CreateReleaseSessionParams,
  HistoryRecord,
  TransitionParams
} from './ReleaseStateMachine'
export { ReleaseValidator } from './ReleaseValidator'
export type { ValidationErrorCode, ValidationResult } from './ReleaseValidator'
