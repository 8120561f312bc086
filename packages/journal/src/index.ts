export { TranscriptJournal } from "./journal.js";
export type { TranscriptJournalOptions, IntegrityReport } from "./journal.js";
