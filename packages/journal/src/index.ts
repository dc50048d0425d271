export { Journal } from "./journal.js";
export type { JournalOptions, JournalListener } from "./journal.js";
