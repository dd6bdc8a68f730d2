export { createManualTimer } from "./manualTimer.js";
export type { ManualTimer } from "./manualTimer.js";

export { createRecordingDriver, createRecordingHighlight } from "./recordingDriver.js";
export type {
  DriverCall,
  RecordingDriver,
  RecordingDriverOptions,
  RecordingHighlight,
} from "./recordingDriver.js";
