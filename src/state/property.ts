import { Config } from '../config.js';
import { Gen } from '../gen.js';
import { Shrinker } from '../gen/shrink.js';
import { Prop } from '../prop.js';
import { Property, forAllShrink } from '../property.js';
import { Command, Specification } from './command.js';
import { generate } from './generate.js';
import { shrink } from './shrink.js';
import { execute } from './execute.js';

export const SHORT_SEQUENCE_LABEL = 'short sequences (between 1-6 commands)';
export const LONG_SEQUENCE_LABEL = 'long sequences (>6 commands)';

export interface StatePropertyOptions<Actual, Model> {
  /** Replaces `generate(spec, config.retryLimit)`. */
  generator?: Gen<Command<Actual, Model>[]>;
  /** Replaces `shrink(spec)`. */
  shrinker?: Shrinker<Command<Actual, Model>[]>;
}

/**
 * Label a sequence outcome by length: empty is trivial, up to six commands
 * is short, more is long.
 */
export function classifyLength(outcome: Prop, length: number): Prop {
  return outcome
    .trivial(length === 0)
    .classify(length >= 1 && length <= 6, SHORT_SEQUENCE_LABEL)
    .classify(length > 6, LONG_SEQUENCE_LABEL);
}

/**
 * Turn a specification into a property over generated command sequences.
 * Failing sequences shrink to smaller ones that still respect every
 * precondition.
 */
export function toProperty<Actual, Model>(
  spec: Specification<Actual, Model>,
  options: StatePropertyOptions<Actual, Model> = {}
): Property<Command<Actual, Model>[]> {
  const { generator, shrinker = shrink(spec) } = options;

  return forAllShrink(
    generator ?? ((config: Config) => generate(spec, config.retryLimit)),
    shrinker,
    (commands) => classifyLength(execute(spec, commands), commands.length)
  );
}
