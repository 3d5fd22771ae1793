export type {
  Condition,
  WorldState,
  Action,
  PlannerConfig,
  PlannerHooks,
  PlanningSuccess,
  PlanningFailure,
  PlanningResult,
} from "./types";

export type { ActionLibrary as IActionLibrary } from "./types";
export { ActionLibrary, applicableForGoal, findAll, isAppropriate } from "./library";
export { contains, difference, union } from "./sets";
export { createPlanner, Planner, PlanningRun } from "./planner";
export type { PlanningRunOptions } from "./planner";
export { PlannerMaxDepthError, LibraryValidationError } from "./errors";
