export { RefreshScheduler } from './scheduler.js'
export type {
  RefreshState,
  RefreshStatus,
  RefreshSchedulerOptions,
  PassOutcome,
  TransformConfig,
} from './types.js'
