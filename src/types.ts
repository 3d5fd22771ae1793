/**
 * An atomic fact about the world. The planner never looks inside it;
 * conditions are only compared for equality.
 */
export type Condition = string;

/**
 * A snapshot of the conditions that are currently true.
 * Duplicates carry no extra meaning.
 */
export type WorldState = ReadonlyArray<Condition>;

/**
 * A named transition between world states.
 * Actions are never mutated once built and may be applied any number of times.
 */
export interface Action {
  /** Label used in the trace. Not required to be unique. */
  readonly name: string;
  /** Conditions that must all be achieved, in order, before the action runs. */
  readonly preconditions: ReadonlyArray<Condition>;
  /** Conditions that hold after the action runs. */
  readonly adds: ReadonlyArray<Condition>;
  /** Conditions that no longer hold after the action runs. Removed before `adds` is applied. */
  readonly deletes: ReadonlyArray<Condition>;
}

/**
 * The ordered set of actions the planner may choose from.
 * Candidate actions for a goal are tried in this order.
 */
export interface ActionLibrary {
  readonly actions: ReadonlyArray<Action>;
}

/**
 * Optional synchronous callbacks fired while a run is in progress.
 */
export interface PlannerHooks {
  /** Called on every attempt to achieve a goal, including goals that already hold. */
  onGoalAttempt?: (goal: Condition, depth: number) => void;
  /**
   * Called once per applied action, in execution order, after the world
   * state has been updated.
   */
  onActionApply?: (action: Action, before: WorldState, after: WorldState) => void;
  /** Called when an action is abandoned because one of its preconditions could not be achieved. */
  onActionFail?: (action: Action, failedPrecondition: Condition, depth: number) => void;
}

/**
 * Configuration options accepted by the planner.
 */
export interface PlannerConfig {
  /** Conditions true before planning begins. Copied, never mutated. */
  initialState: WorldState;
  /** The actions available to the planner. */
  library: ActionLibrary;
  /** Goal conditions, achieved left-to-right. */
  goals: ReadonlyArray<Condition>;
  hooks?: PlannerHooks;
  /**
   * How deeply goals may nest before the run is aborted with
   * {@link PlannerMaxDepthError}. Defaults to 1000.
   * Each level of nesting uses several native stack frames, so a very large
   * limit can let a cyclic library exhaust the call stack first; that
   * surfaces as the engine's own "Maximum call stack size exceeded" error.
   */
  maxDepth?: number;
}

/**
 * Returned when every goal was achieved.
 */
export interface PlanningSuccess {
  success: true;
  /** Names of the applied actions, in execution order. */
  trace: ReadonlyArray<string>;
  finalState: WorldState;
}

/**
 * Returned when some goal could not be achieved. Actions applied before the
 * failure are not undone, so `trace` and `finalState` still reflect them.
 */
export interface PlanningFailure {
  success: false;
  /** The first top-level goal that could not be achieved. */
  failedGoal: Condition;
  trace: ReadonlyArray<string>;
  finalState: WorldState;
}

export type PlanningResult = PlanningSuccess | PlanningFailure;
