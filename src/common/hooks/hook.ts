import { Logger } from '@nestjs/common';
import { pseudorandomString } from '../utils/random-string';
import { Resolver } from './hook-event';
import { Handler, HandlerFunc, HookOptions } from './hook.types';

const HOOK_ID_LENGTH = 20;

interface HandlerRecord<T extends Resolver> {
  id: string;
  priority: number;
  func: HandlerFunc<T>;
}

function normalizePriority(priority: number | undefined): number {
  return priority === undefined || Number.isNaN(priority) ? 0 : priority;
}

// subtraction would yield NaN for two infinite priorities of the same sign
function comparePriority(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function generateHookId(): string {
  return pseudorandomString(HOOK_ID_LENGTH);
}

/**
 * Ordered chain of handlers for one event type.
 *
 * Every handler receives the event and decides whether (and when) to call
 * `event.next()`. Work done before `next()` runs ahead of the remaining
 * handlers, work done after it runs once they have settled. A handler that
 * throws, or returns without calling `next()`, stops the chain there.
 *
 * Mutations and the handler snapshot taken by `trigger` are synchronous, so a
 * bind or unbind made while a trigger is in flight only affects later
 * triggers. One event instance must not be triggered concurrently.
 */
export class Hook<T extends Resolver> {
  private readonly logger: Logger;
  private handlers: HandlerRecord<T>[] = [];

  constructor(options: HookOptions = {}) {
    this.logger = new Logger(options.name ?? Hook.name);
  }

  /**
   * Registers a handler and returns its id.
   *
   * A handler whose id matches an already registered one replaces it in
   * place. Missing or incomplete handlers are ignored and yield `''`.
   */
  bind(handler: Handler<T> | null | undefined): string {
    if (!handler || typeof handler.func !== 'function') {
      return '';
    }

    const record: HandlerRecord<T> = {
      id: handler.id ?? '',
      priority: normalizePriority(handler.priority),
      func: handler.func,
    };

    let replaced = false;

    if (record.id === '') {
      record.id = generateHookId();
      while (this.handlers.some((existing) => existing.id === record.id)) {
        record.id = generateHookId();
      }
    } else {
      const index = this.handlers.findIndex(
        (existing) => existing.id === record.id,
      );
      if (index !== -1) {
        this.handlers[index] = record;
        replaced = true;
      }
    }

    if (!replaced) {
      this.handlers.push(record);
    }

    // Array.prototype.sort is stable
    this.handlers.sort((a, b) => comparePriority(a.priority, b.priority));

    this.logger.debug(
      `${replaced ? 'Replaced' : 'Registered'} handler ${record.id}`,
      {
        priority: record.priority,
        totalHandlers: this.handlers.length,
      },
    );

    return record.id;
  }

  /**
   * Registers a function with the default priority and a generated id.
   */
  bindFunc(func: HandlerFunc<T>): string {
    return this.bind({ func });
  }

  /**
   * Removes the handlers with the given ids. Unknown ids are ignored.
   */
  unbind(...ids: string[]): void {
    for (const id of ids) {
      const index = this.handlers.findIndex((handler) => handler.id === id);
      if (index !== -1) {
        this.handlers.splice(index, 1);
        this.logger.debug(`Unbound handler ${id}`);
      }
    }
  }

  unbindAll(): void {
    this.handlers = [];
    this.logger.debug('Unbound all handlers');
  }

  get length(): number {
    return this.handlers.length;
  }

  /**
   * Runs the registered handlers over `event`, followed by `oneOffFuncs` for
   * this call only.
   *
   * Rejects with the first error that escapes the chain, unchanged.
   */
  trigger(event: T, ...oneOffFuncs: HandlerFunc<T>[]): Promise<void> {
    const funcs: HandlerFunc<T>[] = [
      ...this.handlers.map((handler) => handler.func),
      ...oneOffFuncs,
    ];

    // the event may be reused from a previous trigger
    event.setNextFunc(undefined);

    for (let i = funcs.length - 1; i >= 0; i--) {
      const func = funcs[i];
      const rest = event.nextFunc();
      event.setNextFunc(async () => {
        event.setNextFunc(rest);
        await func(event);
      });
    }

    return event.next();
  }
}
