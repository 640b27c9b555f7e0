import { resolveToken, type LivenessToken, type ObserverRef } from './liveness.js';

export type RemoveMatching = 'shape' | 'reference';

/** Accepts every function type. */
export type AnyCallable = (...args: never) => unknown;

/**
 * Identity key used by `Delegate.remove` under `'shape'` matching.
 *
 * Closures produced by the same expression share their source text, so they
 * cannot be told apart here. Bound and native functions all collapse onto
 * the same `[native code]` body.
 */
export function callableShape(fn: AnyCallable): string {
  return fn.toString();
}

export class Registration<TArgs extends unknown[], TResult> {
  readonly shape: string;
  /** Set once the registry has dropped this entry. */
  detached = false;
  private readonly tokens: readonly WeakRef<LivenessToken>[];

  constructor(
    readonly callable: (...args: TArgs) => TResult,
    observers: readonly ObserverRef[],
  ) {
    this.shape = callableShape(callable);
    this.tokens = observers.map(resolveToken);
  }

  get observerCount(): number {
    return this.tokens.length;
  }

  isExpired(): boolean {
    for (const ref of this.tokens) {
      const token = ref.deref();
      if (!token || !token.alive) return true;
    }
    return false;
  }

  matches(callable: AnyCallable, mode: RemoveMatching): boolean {
    if (mode === 'reference') return this.callable === callable;
    return this.callable === callable || this.shape === callableShape(callable);
  }
}
