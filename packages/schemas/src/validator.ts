import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";
import { WorldLayoutSchema } from "./world-layout.schema.js";
import { TranscriptEventSchema } from "./transcript-event.schema.js";
import type { TranscriptEvent, WorldLayout } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateWorldLayout = ajv.compile<WorldLayout>(WorldLayoutSchema);
const validateTranscriptEvent = ajv.compile<TranscriptEvent>(TranscriptEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateWorldLayoutData(data: unknown): ValidationResult {
  const valid = validateWorldLayout(data);
  return toResult(valid, validateWorldLayout.errors);
}

/** Type guard over the same schema, for loaders that need the narrowed value. */
export function isWorldLayout(data: unknown): data is WorldLayout {
  return validateWorldLayout(data);
}

export function validateTranscriptEventData(data: unknown): ValidationResult {
  const valid = validateTranscriptEvent(data);
  return toResult(valid, validateTranscriptEvent.errors);
}

export function isTranscriptEvent(data: unknown): data is TranscriptEvent {
  return validateTranscriptEvent(data);
}
