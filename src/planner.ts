import type {
  Action,
  ActionLibrary,
  Condition,
  PlannerConfig,
  PlannerHooks,
  PlanningResult,
  WorldState,
} from "./types";
import { PlannerMaxDepthError } from "./errors";
import { applicableForGoal } from "./library";
import { contains, difference, union } from "./sets";

export { PlannerMaxDepthError, LibraryValidationError } from "./errors";

/** Default maximum goal depth before a run is aborted. */
const MAX_RECURSION_DEPTH = 1000;

/**
 * Resolves the configured depth limit, falling back to the default.
 *
 * @throws {RangeError} unless the limit is a positive integer.
 */
function resolveMaxDepth(maxDepth: number | undefined): number {
  const resolved = maxDepth ?? MAX_RECURSION_DEPTH;
  if (!Number.isInteger(resolved) || resolved < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${resolved}.`);
  }
  return resolved;
}

export interface PlanningRunOptions {
  hooks?: PlannerHooks;
  maxDepth?: number;
}

/**
 * The mutable context of one planning run: its own world state, the
 * library it draws actions from, and the trace of applied actions.
 *
 * Successful actions change the state immediately and are never rolled
 * back, not even when the goal they were serving later fails. Build a new
 * run for every independent planning attempt.
 *
 * @example
 * ```ts
 * const run = new PlanningRun(["son-at-home", "car-works"], library);
 * run.run(["son-at-school"]); // true
 * run.trace;                  // ["drive-son-to-school"]
 * ```
 */
export class PlanningRun {
  private _state: Condition[];
  private readonly _trace: string[] = [];
  private readonly library: ActionLibrary;
  private readonly hooks: PlannerHooks | undefined;
  private readonly maxDepth: number;

  constructor(initialState: WorldState, library: ActionLibrary, options: PlanningRunOptions = {}) {
    const maxDepth = resolveMaxDepth(options.maxDepth);
    this._state = [...initialState];
    this.library = library;
    this.hooks = options.hooks;
    this.maxDepth = maxDepth;
  }

  /** The conditions currently true. */
  get state(): WorldState {
    return this._state;
  }

  /** Names of the actions applied so far, in execution order. */
  get trace(): ReadonlyArray<string> {
    return this._trace;
  }

  /**
   * Tries to make `goal` true. A goal that already holds succeeds without
   * touching the state; otherwise the actions that add it are tried in
   * library order until one applies.
   *
   * @throws {PlannerMaxDepthError} when goals nest deeper than `maxDepth`.
   */
  achieve(goal: Condition, depth: number = 0): boolean {
    if (depth > this.maxDepth) {
      throw new PlannerMaxDepthError(goal, this.maxDepth);
    }

    this.hooks?.onGoalAttempt?.(goal, depth);

    if (contains(this._state, goal)) {
      return true;
    }

    const candidates = applicableForGoal(goal, this.library);
    return candidates.some((action) => this.applyOp(action, depth));
  }

  /**
   * Achieves each precondition of `action` in order, then removes its
   * delete-list and asserts its add-list. Stops at the first precondition
   * that cannot be achieved, keeping whatever earlier preconditions changed.
   */
  applyOp(action: Action, depth: number = 0): boolean {
    for (const precondition of action.preconditions) {
      if (!this.achieve(precondition, depth + 1)) {
        this.hooks?.onActionFail?.(action, precondition, depth);
        return false;
      }
    }

    const before = this._state;
    // Deletes first, so a condition in both lists ends up true.
    this._state = union(difference(before, action.deletes), action.adds);
    this._trace.push(action.name);
    this.hooks?.onActionApply?.(action, before, this._state);
    return true;
  }

  /**
   * Achieves `goals` left-to-right and returns the first one that fails,
   * or `undefined` when all of them were achieved.
   */
  firstUnachieved(goals: ReadonlyArray<Condition>): Condition | undefined {
    return goals.find((goal) => !this.achieve(goal));
  }

  /** True when every goal was achieved. Goals after the first failure are not attempted. */
  run(goals: ReadonlyArray<Condition>): boolean {
    return this.firstUnachieved(goals) === undefined;
  }
}

/**
 * Creates a planner bound to an initial state, an action library and a
 * list of goals. Every call to `plan()` starts a fresh {@link PlanningRun}.
 *
 * @example
 * ```ts
 * const result = createPlanner({ initialState, library, goals: ["son-at-school"] }).plan();
 * console.log(result.success ? "SOLVED." : "FAILED.");
 * result.trace.forEach((name) => console.log(`Executing operation: ${name}.`));
 * ```
 */
export function createPlanner(config: PlannerConfig) {
  resolveMaxDepth(config.maxDepth);
  return {
    /**
     * Runs the means-ends planner and reports whether every goal was
     * achieved, together with the trace and the final world state.
     */
    plan(): PlanningResult {
      const { initialState, library, goals, hooks, maxDepth } = config;
      const run = new PlanningRun(initialState, library, { hooks, maxDepth });

      const failedGoal = run.firstUnachieved(goals);

      if (failedGoal !== undefined) {
        return {
          success: false,
          failedGoal,
          trace: [...run.trace],
          finalState: [...run.state],
        };
      }

      return { success: true, trace: [...run.trace], finalState: [...run.state] };
    },
  };
}

/**
 * Means-ends planner class that achieves a goal list against a world state
 * and an action library.
 *
 * @example
 * ```ts
 * const planner = new Planner();
 * const result = planner.resolve(["son-at-home", "car-works"], library, ["son-at-school"]);
 * if (result.success) {
 *   result.trace.forEach((name) => console.log(name));
 * }
 * ```
 */
export class Planner {
  /**
   * @param state    The world state before planning begins.
   * @param library  The actions available to the planner.
   * @param goals    Goal conditions, achieved left-to-right.
   * @param options  Hooks and depth limit for the run.
   */
  resolve(
    state: WorldState,
    library: ActionLibrary,
    goals: ReadonlyArray<Condition>,
    options: PlanningRunOptions = {}
  ): PlanningResult {
    return createPlanner({ initialState: state, library, goals, ...options }).plan();
  }
}
