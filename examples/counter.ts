/**
 * Model-based testing of a counter.
 *
 * A counter is compared against an integer model. The second run plants a
 * bug in `increment` and prints the shrunk counterexample.
 */

import {
  Config,
  Gen,
  Seed,
  command,
  specification,
  toProperty,
} from '../src/index.js';

class Counter {
  value = 0;

  constructor(private readonly step: number) {}

  increment(): Counter {
    this.value += this.step;
    return this;
  }

  decrement(): Counter {
    this.value -= 1;
    return this;
  }
}

const increment = command<Counter, number>({
  name: 'Increment',
  runActual: (counter) => counter.increment(),
  runModel: (n) => n + 1,
  post: (counter, n) => counter.value === n,
});

const decrement = command<Counter, number>({
  name: 'Decrement',
  pre: (n) => n > 0,
  runActual: (counter) => counter.decrement(),
  runModel: (n) => n - 1,
  post: (counter, n) => counter.value === n,
});

const counterSpec = (step: number) =>
  specification<Counter, number>({
    initialActual: () => new Counter(step),
    initialModel: () => 0,
    next: () => Gen.item([increment, decrement]),
  });

console.log('Example 1: a correct counter');
const passing = toProperty(counterSpec(1)).run(
  Config.default(),
  Seed.fromNumber(42)
);
console.log(`Result: ${passing.type}`);
const { testsRun, labels } = passing.stats;
for (const [label, count] of labels) {
  console.log(`  ${Math.round((count / testsRun) * 100)}% ${label}`);
}

console.log('\nExample 2: a counter that increments by two');
const failing = toProperty(counterSpec(2)).run(
  Config.default(),
  Seed.fromNumber(42)
);
if (failing.type === 'fail') {
  const commands = failing.counterexample.value.map((c) => c.toString());
  console.log(`Counterexample: [${commands.join(', ')}]`);
  console.log(`Shrink steps: ${failing.stats.shrinkSteps}`);
  for (const failure of failing.failure.failures) {
    console.log(
      `  step ${failure.step?.index}: ${failure.step?.command} -> ${failure.message}`
    );
  }
}
