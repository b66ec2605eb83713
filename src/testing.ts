/**
 * Test helpers, exported as `guarded-lifecycle/testing`.
 * @module
 */

export { type CapturedEntry, captureLogs } from "./testing/log-capture.js";
export {
  approvingGuard,
  denyingGuard,
  type RecordingGuard,
  recordingGuard,
} from "./testing/recording-guard.js";
