// Model-based testing of stateful systems
export {
  BaseCommand,
  command,
  specification,
} from './state/command.js';
export type {
  Command,
  CommandDefinition,
  Specification,
} from './state/command.js';
export { generate } from './state/generate.js';
export { shrink, isConsistent } from './state/shrink.js';
export { execute } from './state/execute.js';
export {
  toProperty,
  classifyLength,
  SHORT_SEQUENCE_LABEL,
  LONG_SEQUENCE_LABEL,
} from './state/property.js';
export type { StatePropertyOptions } from './state/property.js';
