import { Resolver } from './hook-event';

export type HandlerFunc<T extends Resolver> = (event: T) => Promise<void> | void;

export interface Handler<T extends Resolver> {
  /**
   * Handler body. Must call `event.next()` for the chain to continue.
   */
  func: HandlerFunc<T>;

  /**
   * Identifier used by `Hook.unbind`. Generated when missing.
   */
  id?: string;

  /**
   * Lower runs earlier. Handlers with the same priority keep their
   * registration order. Defaults to 0, which NaN also falls back to.
   */
  priority?: number;
}

export interface HookOptions {
  /** Logger context; defaults to `Hook`. */
  name?: string;
}
