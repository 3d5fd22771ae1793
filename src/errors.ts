import type { Condition } from "./types";

/**
 * Thrown when goals nest deeper than the configured maximum, which
 * typically means a goal can only be achieved by first achieving itself.
 *
 * @example
 * ```ts
 * try {
 *   createPlanner({ initialState, library, goals }).plan();
 * } catch (err) {
 *   if (err instanceof PlannerMaxDepthError) {
 *     console.error(`Planning did not terminate while achieving ${err.goal}`);
 *   }
 * }
 * ```
 */
export class PlannerMaxDepthError extends Error {
  readonly maxDepth: number;
  /** The goal whose attempt crossed the limit. */
  readonly goal: Condition;

  constructor(goal: Condition, maxDepth: number) {
    super(
      `Planner exceeded the maximum goal depth of ${maxDepth} while achieving "${goal}". ` +
        "This usually indicates a cyclic goal dependency."
    );
    this.name = "PlannerMaxDepthError";
    this.goal = goal;
    this.maxDepth = maxDepth;
  }
}

/**
 * Thrown by {@link ActionLibrary.validate} when an action needs a condition
 * that is neither in the initial state nor added by any action.
 *
 * @example
 * ```ts
 * try {
 *   library.validate(initialState);
 * } catch (err) {
 *   if (err instanceof LibraryValidationError) {
 *     console.error(`${err.actionName} can never run: ${err.condition}`);
 *   }
 * }
 * ```
 */
export class LibraryValidationError extends Error {
  /** The precondition that nothing can establish. */
  readonly condition: Condition;
  /** The first action that requires it. */
  readonly actionName: string;

  constructor(condition: Condition, actionName: string) {
    super(
      `Library validation failed: precondition "${condition}" of action "${actionName}" ` +
        "is not in the initial state and is not added by any action."
    );
    this.name = "LibraryValidationError";
    this.condition = condition;
    this.actionName = actionName;
  }
}
