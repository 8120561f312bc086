export { go } from "./verbs/go.js";
export { get, drop } from "./verbs/items.js";
export { open, close } from "./verbs/openings.js";
export { look } from "./verbs/look.js";
export { change } from "./verbs/change.js";
export { perform, toPlacement } from "./perform.js";
export { refusals, succeeded, wrongPlacement, visibleItems } from "./common.js";
export type { ActionResult } from "./common.js";
