import type { Action, ActionLibrary as IActionLibrary, Condition, WorldState } from "./types";
import { LibraryValidationError } from "./errors";
import { contains, union } from "./sets";

/**
 * An action is appropriate for a goal when the goal is in its add-list.
 */
export function isAppropriate(goal: Condition, action: Action): boolean {
  return contains(action.adds, goal);
}

/**
 * Every element of `items` for which `predicate(goal, item)` holds, in order.
 */
export function findAll<TGoal, TItem>(
  goal: TGoal,
  items: ReadonlyArray<TItem>,
  predicate: (goal: TGoal, item: TItem) => boolean
): TItem[] {
  return items.filter((item) => predicate(goal, item));
}

/**
 * The actions of `library` that add `goal`, in library order.
 * An empty result is an ordinary "no candidates" outcome.
 */
export function applicableForGoal(goal: Condition, library: IActionLibrary): Action[] {
  return findAll(goal, library.actions, isAppropriate);
}

/**
 * A mutable registry that builds an action library one action at a time.
 *
 * Implements the {@link IActionLibrary} interface so it can be passed
 * directly to {@link createPlanner}.
 *
 * @example
 * ```ts
 * const library = new ActionLibrary()
 *   .registerAction({ name: "look-up-number", preconditions: ["have-phone-book"], adds: ["know-phone-number"], deletes: [] })
 *   .registerAction({ name: "telephone-shop", preconditions: ["know-phone-number"], adds: ["in-communication-with-shop"], deletes: [] });
 * ```
 */
export class ActionLibrary implements IActionLibrary {
  private readonly _actions: Action[] = [];

  /** Registered actions in registration order. */
  get actions(): ReadonlyArray<Action> {
    return this._actions;
  }

  /**
   * Append an action. The same action (or another with the same name) may be
   * registered more than once; each registration is a separate candidate.
   *
   * @throws {TypeError} if `action.name` is an empty string.
   * @returns `this` for fluent chaining.
   */
  registerAction(action: Action): this {
    if (action.name === "") {
      throw new TypeError("Action name must not be empty.");
    }
    this._actions.push(action);
    return this;
  }

  /**
   * @returns The first action registered under `name`, or `undefined`.
   */
  getAction(name: string): Action | undefined {
    return this._actions.find((a) => a.name === name);
  }

  appropriateFor(goal: Condition): Action[] {
    return applicableForGoal(goal, this);
  }

  /**
   * Checks that every precondition can at least in principle be
   * established: it is either in `initialState` or in some action's
   * add-list. Passing this check does not mean planning will succeed.
   *
   * @throws {LibraryValidationError} for the first unreachable precondition.
   * @returns `this` for fluent chaining.
   */
  validate(initialState: WorldState): this {
    const reachable = this._actions.reduce<Condition[]>(
      (acc, action) => union(acc, action.adds),
      [...initialState]
    );
    for (const action of this._actions) {
      for (const precondition of action.preconditions) {
        if (!contains(reachable, precondition)) {
          throw new LibraryValidationError(precondition, action.name);
        }
      }
    }
    return this;
  }
}
