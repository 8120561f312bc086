export { Entity, Visibility, SIZE_ORDER, OBSTACLE_SUFFIX, obstacleKey } from "./entity.js";
export type { Placement, UndoRecord } from "./entity.js";
export { TransactionLog, Checkpoint } from "./transaction-log.js";
export type { UndoScope } from "./transaction-log.js";
export {
  World,
  CHANGEABLE_PROPERTIES,
  PLAYER_NAME_KEYS,
  DESCRIPTION_CANDIDATES,
  KNOWN_DIRECTIONS,
} from "./world.js";
export type { WorldOptions } from "./world.js";
export { bfsPath, PathTable } from "./paths.js";
export type { ExitGraph, PathStep } from "./paths.js";
export {
  buildEntity,
  buildPlayer,
  buildPlace,
  buildDoor,
  buildTable,
  buildBed,
  buildWindow,
  buildBook,
  connect,
} from "./builders.js";
export type { EntityTraits, At } from "./builders.js";
export { validateReachability } from "./reachability.js";
export { describeEntity, uniqueDescription, uniqueDescriptions, similarObjects, nounPhrase } from "./descriptions.js";
export type { Description, SeenClass } from "./descriptions.js";
export {
  parseLayout,
  loadLayoutFile,
  loadWorld,
  buildWorld,
  bundledLayoutPath,
  BUNDLED_LAYOUTS_DIR,
} from "./layout.js";
