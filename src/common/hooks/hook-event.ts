/**
 * Continuation installed on an event while a hook chain runs.
 */
export type NextFunc = () => Promise<void>;

/**
 * Capability every hook event must expose so a {@link Hook} can chain
 * handlers over it.
 */
export interface Resolver {
  /**
   * Continues with the next handler in the chain.
   *
   * Resolves immediately when there is nothing left to run.
   */
  next(): Promise<void>;

  /** @internal */
  nextFunc(): NextFunc | undefined;

  /** @internal */
  setNextFunc(fn: NextFunc | undefined): void;
}

/**
 * Base class for hook events.
 *
 * @example
 * class CustomEvent extends HookEvent {
 *   constructor(public someField: number) {
 *     super();
 *   }
 * }
 *
 * const hook = new Hook<CustomEvent>();
 * hook.bindFunc(async (e) => {
 *   console.log(e.someField);
 *   await e.next();
 * });
 * await hook.trigger(new CustomEvent(123));
 */
export class HookEvent implements Resolver {
  private nextHandler: NextFunc | undefined;

  /**
   * A handler that never calls this stops the chain at itself.
   */
  next(): Promise<void> {
    if (this.nextHandler) {
      return this.nextHandler();
    }

    return Promise.resolve();
  }

  nextFunc(): NextFunc | undefined {
    return this.nextHandler;
  }

  setNextFunc(fn: NextFunc | undefined): void {
    this.nextHandler = fn;
  }
}
