/**
 * Shared flag telling whether the object that minted it still exists.
 *
 * Registrations only ever hold a `WeakRef` to a token, so a token collected
 * together with its owner reads as dead as well.
 */
export class LivenessToken {
  #alive = true;

  get alive(): boolean {
    return this.#alive;
  }

  /** One-way: a dead token never comes back. */
  invalidate(): void {
    this.#alive = false;
  }
}

export interface ObserverLike {
  readonly liveness: LivenessToken;
}

/** An observer passed as-is, or through a weak handle that may already be empty. */
export type ObserverRef = ObserverLike | WeakRef<ObserverLike>;

/**
 * Lifetime anchor for subscriptions.
 *
 * Either keep one as a field:
 *
 *   class Panel {
 *     readonly observer = new Observer();
 *     constructor(changed: Delegate<[number]>) {
 *       changed.add((n) => this.render(n), this.observer);
 *     }
 *   }
 *
 * or extend it, so that the subscribing object is its own observer. Classes
 * that already extend something else get the same through `withObserver`.
 */
export class Observer implements ObserverLike {
  readonly liveness = new LivenessToken();

  get disposed(): boolean {
    return !this.liveness.alive;
  }

  dispose(): void {
    this.liveness.invalidate();
  }
}

// Mixin constructors must take `any[]`.
type Constructor = abstract new (...args: any[]) => object;

export function withObserver<TBase extends Constructor>(Base: TBase) {
  abstract class ObservingBase extends Base implements ObserverLike {
    readonly liveness = new LivenessToken();

    get disposed(): boolean {
      return !this.liveness.alive;
    }

    dispose(): void {
      this.liveness.invalidate();
    }
  }
  return ObservingBase;
}

const gone = new LivenessToken();
gone.invalidate();

export function resolveToken(ref: ObserverRef): WeakRef<LivenessToken> {
  const observer = ref instanceof WeakRef ? ref.deref() : ref;
  return new WeakRef(observer ? observer.liveness : gone);
}
