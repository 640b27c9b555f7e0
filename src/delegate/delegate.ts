import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import type { ObserverRef } from './liveness.js';
import { Registration, type RemoveMatching } from './registration.js';
import { collectStrategy, voidStrategy, type StrategyFactory } from './strategy.js';

export type Unsubscribe = () => void;

export interface DelegateOptions {
  /** Name used in log entries. */
  label?: string;
  /** How `remove` identifies callables; defaults to the configured `remove_matching`. */
  removeMatching?: RemoveMatching;
}

/**
 * Ordered registry of callables invoked as a group.
 *
 * - Callables registered with observers are skipped and evicted once any of
 *   those observers is disposed or collected
 * - Invocation walks a snapshot, so subscribers may add, remove or invoke on
 *   the same delegate; additions wait for the next invocation, removals take
 *   effect immediately
 * - Subscriber errors propagate and abort the rest of the batch
 */
export abstract class DelegateBase<TArgs extends unknown[], TResult, TOutput> {
  readonly label: string;
  readonly removeMatching: RemoveMatching;
  private entries: Registration<TArgs, TResult>[] = [];

  protected constructor(
    private readonly strategy: StrategyFactory<TResult, TOutput>,
    options: DelegateOptions = {},
  ) {
    this.label = options.label ?? 'delegate';
    this.removeMatching = options.removeMatching ?? getConfig().remove_matching;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Registers `callable`, tied to the lifetime of every observer given.
   *
   * The returned handle removes exactly this registration.
   */
  add(callable: (...args: TArgs) => TResult, ...observers: ObserverRef[]): Unsubscribe {
    this.prune();
    const entry = new Registration(callable, observers);
    this.entries.push(entry);

    if (logger.enabled) {
      logger.log({
        type: 'ADD',
        delegate: this.label,
        content: `Added subscriber #${this.entries.length}`,
        metadata: { count: this.entries.length, observers: entry.observerCount },
      });
    }

    return () => {
      if (entry.detached) return;
      this.detachWhere((e) => e === entry);
      this.logRemoval(1);
    };
  }

  /**
   * Removes every registration matching `callable`.
   *
   * Under `'shape'` matching, closures created by the same expression match
   * each other even when their captured values differ. Use the handle
   * returned by `add` to drop a single registration.
   */
  remove(callable: (...args: TArgs) => TResult): number {
    const removed = this.detachWhere((e) => e.matches(callable, this.removeMatching));
    this.logRemoval(removed);
    return removed;
  }

  clear(): void {
    const count = this.entries.length;
    for (const entry of this.entries) entry.detached = true;
    this.entries = [];
    if (logger.enabled) {
      logger.log({ type: 'CLEAR', delegate: this.label, content: `Cleared ${count} subscriber(s)`, metadata: { count } });
    }
  }

  /** Evicts expired registrations now; returns how many went. */
  prune(): number {
    const evicted = this.detachWhere((e) => e.isExpired());
    if (evicted > 0) this.logEviction(evicted);
    return evicted;
  }

  invoke(...args: TArgs): TOutput {
    const strategy = this.strategy();
    if (!strategy.begin(this.entries.length)) return strategy.finish();

    const snapshot = this.entries.slice();
    let called = 0;
    let evicted = 0;
    try {
      for (const entry of snapshot) {
        if (entry.detached) continue;
        if (entry.isExpired()) {
          entry.detached = true;
          evicted++;
          continue;
        }
        called++;
        strategy.accept(entry.callable(...args));
      }
    } finally {
      if (evicted > 0) {
        this.entries = this.entries.filter((e) => !e.detached);
        this.logEviction(evicted);
      }
      if (logger.enabled) {
        logger.log({
          type: 'INVOKE',
          delegate: this.label,
          content: `Invoked ${called} subscriber(s)`,
          metadata: { called, evicted, count: this.entries.length },
        });
      }
    }
    return strategy.finish();
  }

  /** `add` without observers, chainable. */
  on(callable: (...args: TArgs) => TResult): this {
    this.add(callable);
    return this;
  }

  /** `remove`, chainable. */
  off(callable: (...args: TArgs) => TResult): this {
    this.remove(callable);
    return this;
  }

  /** A plain function that invokes this delegate, for APIs that expect a callback. */
  asFunction(): (...args: TArgs) => TOutput {
    return (...args) => this.invoke(...args);
  }

  private detachWhere(predicate: (entry: Registration<TArgs, TResult>) => boolean): number {
    const kept: Registration<TArgs, TResult>[] = [];
    for (const entry of this.entries) {
      if (predicate(entry)) entry.detached = true;
      else kept.push(entry);
    }
    const removed = this.entries.length - kept.length;
    this.entries = kept;
    return removed;
  }

  private logRemoval(count: number) {
    if (!logger.enabled) return;
    logger.log({ type: 'REMOVE', delegate: this.label, content: `Removed ${count} subscriber(s)`, metadata: { count } });
  }

  private logEviction(count: number) {
    if (!logger.enabled) return;
    logger.log({ type: 'EVICT', delegate: this.label, content: `Evicted ${count} expired subscriber(s)`, metadata: { count } });
  }
}

/** Fire-and-forget delegate: subscribers' return values are discarded. */
export class Delegate<TArgs extends unknown[] = []> extends DelegateBase<TArgs, void, void> {
  constructor(options?: DelegateOptions) {
    super(voidStrategy, options);
  }
}

/** Delegate whose `invoke` returns every live subscriber's result, in registration order. */
export class ResultDelegate<TArgs extends unknown[], TResult> extends DelegateBase<TArgs, TResult, TResult[]> {
  constructor(options?: DelegateOptions) {
    super(collectStrategy, options);
  }
}
