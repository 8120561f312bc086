export * from "./types.js";
export * from "./statements.js";
export { InvariantError, LayoutError } from "./errors.js";
export type { InvariantCode } from "./errors.js";
export { PrefixLogger, createLogger, resolveLogLevel } from "./logger.js";
export { SeededRandom } from "./random.js";
export type { RandomState } from "./random.js";
export { validateWorldLayoutData, validateTranscriptEventData, isWorldLayout, isTranscriptEvent } from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { WorldLayoutSchema } from "./world-layout.schema.js";
export { TranscriptEventSchema } from "./transcript-event.schema.js";
