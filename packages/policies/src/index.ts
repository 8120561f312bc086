export {
  evaluateGoal,
  constant,
  stepsSublist,
  anyStep,
  reachLocation,
  envFeedback,
  allOf,
  anyOf,
  startOf,
} from "./goals.js";
export type { Goal, GoalKind, DialogueView } from "./goals.js";
export { requestOf } from "./context.js";
export type { PolicyContext, PolicyOutcome, PolicyBookLike, EntityTask } from "./context.js";
export { PolicyBook, DEFAULT_VARIANTS } from "./book.js";
export type { AgentVariant, BookSnapshot } from "./book.js";
export { UserPolicy } from "./user.js";
export { EnvironmentPolicy } from "./environment.js";
export type { EnvironmentOptions } from "./environment.js";
export { goDirectionTask, goLocationTask } from "./movement.js";
export { getTask, dropTask, lookTask, openCloseTask, changeTask, planAction } from "./item-tasks.js";
export type { ActionPlan } from "./item-tasks.js";
export { isPropertyTask, isAttributeTask } from "./questions.js";
export { resolveAbstract } from "./abstract-items.js";
export { speculate, saySteps, unrevealedLocation } from "./reasoning.js";
