export { Dialogue, MAX_SAFETY_TURNS } from "./dialogue.js";
export type { Participant, PolicyFailure, DialogueOptions, DialogueSnapshot } from "./dialogue.js";
export { DialogueEngine } from "./engine.js";
export type {
  EngineOptions,
  EngineSnapshot,
  ExecuteOptions,
  BatchOptions,
  BatchFailure,
  BatchReport,
  TranscriptSink,
} from "./engine.js";
export { RequestSampler, abstractOf, PRIMITIVE_KINDS, REQUEST_KINDS } from "./sampler.js";
export type { RequestKind, PrimitiveKind, SamplerOptions, SampledRequest } from "./sampler.js";
export { renderStatement, renderRequest, renderUtterance } from "./render.js";
