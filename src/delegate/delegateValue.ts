import { Delegate, type DelegateOptions } from './delegate.js';

/**
 * A value that notifies its subscribers on every assignment.
 *
 * The new value is stored before subscribers run, so reading it back during
 * notification yields the new value. Assigning an equal value notifies again.
 */
export class DelegateValue<T> extends Delegate<[T]> {
  private current: T;

  constructor(initial: T, options?: DelegateOptions) {
    super(options);
    this.current = initial;
  }

  get value(): T {
    return this.current;
  }

  set value(next: T) {
    this.set(next);
  }

  get(): T {
    return this.current;
  }

  set(next: T): this {
    this.current = next;
    this.invoke(next);
    return this;
  }

  update(fn: (current: T) => T): this {
    return this.set(fn(this.current));
  }
}
