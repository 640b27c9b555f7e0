export { Delegate, DelegateBase, ResultDelegate, type DelegateOptions, type Unsubscribe } from './delegate.js';
export { DelegateValue } from './delegateValue.js';
export { LivenessToken, Observer, withObserver, type ObserverLike, type ObserverRef } from './liveness.js';
export { callableShape, Registration, type AnyCallable, type RemoveMatching } from './registration.js';
export { collectStrategy, voidStrategy, type InvocationStrategy, type StrategyFactory } from './strategy.js';
