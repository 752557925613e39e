/**
 * Verification results.
 *
 * A `Prop` is the already-evaluated outcome of a check: pass or fail, the
 * reasons for failure, and the labels attached for classification. Labels
 * never change whether a `Prop` passes.
 */

/**
 * Where in a command sequence a failure was observed. `model` and `actual`
 * are the states right after the step ran; `actual` is the live handle and
 * may have been changed by later steps.
 */
export interface StepContext {
  readonly index: number;
  readonly command: string;
  readonly model: unknown;
  readonly actual: unknown;
}

export interface PropFailure {
  readonly message: string;
  readonly step?: StepContext;
  /** The value thrown by user code, when the failure is an exception. */
  readonly error?: unknown;
}

/**
 * Anything that can stand for a verification result.
 */
export type Testable = boolean | Prop;

export const TRIVIAL_LABEL = 'trivial';

export class Prop {
  private constructor(
    readonly failures: readonly PropFailure[],
    readonly labels: readonly string[]
  ) {}

  static pass(): Prop {
    return new Prop([], []);
  }

  static fail(message: string = 'Falsifiable'): Prop {
    return new Prop([{ message }], []);
  }

  static exception(error: unknown): Prop {
    const message =
      error instanceof Error
        ? `Exception: ${error.name}: ${error.message}`
        : `Exception: ${String(error)}`;
    return new Prop([{ message, error }], []);
  }

  static of(testable: Testable): Prop {
    if (typeof testable === 'boolean') {
      return testable ? Prop.pass() : Prop.fail();
    }
    return testable;
  }

  /**
   * Run a check and turn anything it throws into a failing `Prop`.
   */
  static evaluate(check: () => Testable): Prop {
    try {
      return Prop.of(check());
    } catch (error) {
      return Prop.exception(error);
    }
  }

  get passed(): boolean {
    return this.failures.length === 0;
  }

  /**
   * Conjunction. Fails if either side fails; keeps the failures and labels of
   * both, left before right.
   */
  and(other: Testable): Prop {
    const right = Prop.of(other);
    return new Prop(
      [...this.failures, ...right.failures],
      mergeLabels(this.labels, right.labels)
    );
  }

  label(name: string): Prop {
    return new Prop(this.failures, mergeLabels(this.labels, [name]));
  }

  classify(condition: boolean, name: string): Prop {
    return condition ? this.label(name) : this;
  }

  trivial(condition: boolean): Prop {
    return this.classify(condition, TRIVIAL_LABEL);
  }

  /**
   * Attach step context to every failure that does not carry one yet.
   */
  atStep(step: StepContext): Prop {
    if (this.passed) {
      return this;
    }
    return new Prop(
      this.failures.map((failure) =>
        failure.step === undefined ? { ...failure, step } : failure
      ),
      this.labels
    );
  }

  toString(): string {
    if (this.passed) {
      return 'Prop(pass)';
    }
    return `Prop(fail: ${this.failures.map((f) => f.message).join('; ')})`;
  }
}

function mergeLabels(
  left: readonly string[],
  right: readonly string[]
): readonly string[] {
  const merged = [...left];
  for (const label of right) {
    if (!merged.includes(label)) {
      merged.push(label);
    }
  }
  return merged;
}
