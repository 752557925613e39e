import { Shrinker, restartable, shrinkList } from '../gen/shrink.js';
import { Command, Specification } from './command.js';

/**
 * Whether every command's precondition holds against the model reached by
 * replaying the commands before it, starting from a fresh initial model.
 * Stops at the first precondition that fails.
 */
export function isConsistent<Actual, Model>(
  spec: Specification<Actual, Model>,
  commands: readonly Command<Actual, Model>[]
): boolean {
  let model = spec.initialModel();
  for (const cmd of commands) {
    if (!cmd.pre(model)) {
      return false;
    }
    model = cmd.runModel(model);
  }
  return true;
}

/**
 * Shrinker for command sequences.
 *
 * Candidates come from structural list shrinking, in its order; any candidate
 * that is not consistent with the specification is dropped whole. Commands
 * themselves are not shrunk.
 */
export function shrink<Actual, Model>(
  spec: Specification<Actual, Model>
): Shrinker<Command<Actual, Model>[]> {
  return (commands) =>
    restartable(function* () {
      for (const candidate of shrinkList(commands)) {
        if (isConsistent(spec, candidate)) {
          yield candidate;
        }
      }
    });
}
