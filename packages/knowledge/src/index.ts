export { KnowledgeBase } from "./knowledge-base.js";
export type { KnowledgeBaseOptions, KnowledgeCheckpoint } from "./knowledge-base.js";
export { ContextLog } from "./context-log.js";
export { UPDATERS, recordFact, observeProperty, observeAttribute, validity } from "./updaters.js";
export type { KnowledgeState, Updater } from "./updaters.js";
export { CHECKERS, factCheck, seenProperty, seenAttribute } from "./checkers.js";
export type { Checker } from "./checkers.js";
