export {
  parseSessionRecord,
  readSessionRecord,
  serializeSessionRecord,
  writeSessionRecord,
} from "./session-record.js";
export { recordFromJournal } from "./from-journal.js";
export { replaySession } from "./replay.js";
export type { ReplayOptions, ReplayReport } from "./replay.js";
