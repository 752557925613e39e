import { Gen } from '../gen.js';
import { Testable } from '../prop.js';

/**
 * A single operation on the system under test, mirrored on a model.
 *
 * `pre`, `runModel` and `post` must be pure; `runActual` is the only place
 * side effects belong. Whatever a facet throws propagates to the caller.
 */
export interface Command<Actual, Model> {
  /** Whether the command may run in the given model state. */
  pre(model: Model): boolean;
  runModel(model: Model): Model;
  /** Applies the command to the real system and returns its handle. */
  runActual(actual: Actual): Actual;
  /** Compares the states reached after both transitions. */
  post(actual: Actual, model: Model): Testable;
  toString(): string;
}

/**
 * Base class for commands defined as types of their own. The precondition and
 * postcondition hold by default.
 */
export abstract class BaseCommand<Actual, Model>
  implements Command<Actual, Model>
{
  abstract runActual(actual: Actual): Actual;
  abstract runModel(model: Model): Model;

  pre(_model: Model): boolean {
    return true;
  }

  post(_actual: Actual, _model: Model): Testable {
    return true;
  }

  toString(): string {
    return this.constructor.name;
  }
}

export interface CommandDefinition<Actual, Model> {
  name?: string;
  pre?: (model: Model) => boolean;
  runActual: (actual: Actual) => Actual;
  runModel: (model: Model) => Model;
  post?: (actual: Actual, model: Model) => Testable;
}

/**
 * Build a command from a record of functions.
 *
 * @example
 * const increment = command<Counter, number>({
 *   name: 'Increment',
 *   runActual: (counter) => counter.increment(),
 *   runModel: (n) => n + 1,
 *   post: (counter, n) => counter.value === n,
 * });
 */
export function command<Actual, Model>(
  definition: CommandDefinition<Actual, Model>
): Command<Actual, Model> {
  const { name = 'command', pre, runActual, runModel, post } = definition;

  return Object.freeze({
    pre: (model: Model) => (pre === undefined ? true : pre(model)),
    runModel,
    runActual,
    post: (actual: Actual, model: Model): Testable =>
      post === undefined ? true : post(actual, model),
    toString: () => name,
  });
}

/**
 * The initial states of the system and its model, and how to propose the next
 * command for a model state.
 *
 * `initialActual` and `initialModel` are called again for every generation,
 * shrink check and execution, so each evaluation starts from a fresh pair.
 * Commands proposed by `next` need not satisfy their precondition; generation
 * filters on it.
 */
export interface Specification<Actual, Model> {
  initialActual(): Actual;
  initialModel(): Model;
  next(model: Model): Gen<Command<Actual, Model>>;
}

/**
 * Identity helper that fixes the type parameters of a specification literal.
 */
export function specification<Actual, Model>(
  spec: Specification<Actual, Model>
): Specification<Actual, Model> {
  return spec;
}
