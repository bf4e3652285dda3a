export { assert, describe, test } from "./nodeTest.js";
export {
  RecordingSurface,
  type SurfaceCall,
  createRecordingSurface,
  recordingBackend,
} from "./recordingSurface.js";
export { ManualClock } from "./manualClock.js";
export { assertClose, assertPointClose } from "./approx.js";
