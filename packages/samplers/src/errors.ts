/** Base class of the errors raised by the samplers */
export class CadenceError extends Error {
  override readonly name: string = 'CadenceError';
}

/** The sampler options are invalid or contradict each other */
export class ConfigurationError extends CadenceError {
  override readonly name = 'ConfigurationError';

  constructor(
    /** Dotted path of the offending option */
    readonly path: string,
    /** What is wrong with it */
    readonly reason: string,
  ) {
    super(path ? `${path}: ${reason}` : reason);
  }
}

export type InvocationPhase = 'warmup' | 'sampling';

/** The function under test threw */
export class TargetInvocationError extends CadenceError {
  override readonly name = 'TargetInvocationError';

  constructor(
    readonly phase: InvocationPhase,
    /** Zero-based index of the failed invocation within its phase */
    readonly iteration: number,
    cause: unknown,
  ) {
    super(
      `The function under test failed during ${phase} (iteration ${iteration}): ${describeCause(cause)}`,
      { cause },
    );
  }
}

/** A summary was requested for an empty sample */
export class EmptyInputError extends CadenceError {
  override readonly name = 'EmptyInputError';

  constructor() {
    super('Cannot summarize an empty sample');
  }
}

/** The measured invocations took longer than the time budget */
export class TimeBudgetError extends CadenceError {
  override readonly name = 'TimeBudgetError';

  constructor(
    /** Total measured time (s) */
    readonly elapsed: number,
    /** The budget (s) */
    readonly maxTime: number,
  ) {
    super(`Exceeded the maximum allowed time: ${elapsed}s > ${maxTime}s`);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
