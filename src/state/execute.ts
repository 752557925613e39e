import { Prop } from '../prop.js';
import { Command, Specification } from './command.js';

/**
 * Replay commands against a fresh system and model in lockstep.
 *
 * Each step runs `runActual`, then `runModel`, then checks `post` on the new
 * pair. Results of all steps are conjoined: every step runs even after one
 * has failed, and each failure records the step it came from. Exceptions
 * from user code are not caught here.
 */
export function execute<Actual, Model>(
  spec: Specification<Actual, Model>,
  commands: readonly Command<Actual, Model>[]
): Prop {
  let actual = spec.initialActual();
  let model = spec.initialModel();
  let result = Prop.pass();

  commands.forEach((cmd, index) => {
    actual = cmd.runActual(actual);
    model = cmd.runModel(model);
    const step = Prop.of(cmd.post(actual, model));
    result = result.and(
      step.atStep({ index, command: cmd.toString(), model, actual })
    );
  });

  return result;
}
