import { Gen, DEFAULT_RETRY_LIMIT } from '../gen.js';
import { assertRetryLimit } from '../gen/core.js';
import { Tree } from '../data/tree.js';
import { Command, Specification } from './command.js';

/**
 * Generator of command sequences that respect every precondition.
 *
 * The size is the budget: at most that many commands are drawn. Each draw
 * samples `spec.next(model)` until a command's precondition holds in the
 * current model, giving up after `retryLimit` attempts. Giving up ends the
 * sequence early; it is not an error.
 */
export function generate<Actual, Model>(
  spec: Specification<Actual, Model>,
  retryLimit: number = DEFAULT_RETRY_LIMIT
): Gen<Command<Actual, Model>[]> {
  assertRetryLimit(retryLimit);

  return Gen.create((size, seed) => {
    const commands: Command<Actual, Model>[] = [];
    let model = spec.initialModel();
    let currentSeed = seed;

    for (let budget = size.get(); budget > 0; budget--) {
      const [drawSeed, nextSeed] = currentSeed.split();
      currentSeed = nextSeed;

      const state = model;
      const drawn = spec
        .next(state)
        .tryWhere((candidate) => candidate.pre(state), retryLimit)
        .generate(size, drawSeed).value;
      if (drawn === undefined) {
        break;
      }

      commands.push(drawn);
      model = drawn.runModel(model);
    }

    return Tree.singleton(commands);
  });
}
