export {
  AutoUpdater,
  type AutoUpdaterOptions,
  type BatchResult,
  type RunNowResult,
  type SchedulerStatus,
  type UpdateCheckRecorder,
  type UpdateTarget
} from './scheduler.js';
export { UpdateLog, type UpdateLogEntry, type UpdateStatus } from './update-log.js';
