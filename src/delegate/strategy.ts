/**
 * What a delegate does with its subscribers' return values.
 *
 * `begin` runs once per invocation, before any subscriber; returning
 * `false` skips the walk (and the pruning that comes with it).
 */
export interface InvocationStrategy<TResult, TOutput> {
  begin(entryCount: number): boolean;
  accept(result: TResult): void;
  finish(): TOutput;
}

export type StrategyFactory<TResult, TOutput> = () => InvocationStrategy<TResult, TOutput>;

export function voidStrategy<TResult>(): InvocationStrategy<TResult, void> {
  return {
    begin: (entryCount) => entryCount > 0,
    accept: () => {},
    finish: () => undefined,
  };
}

export function collectStrategy<TResult>(): InvocationStrategy<TResult, TResult[]> {
  const results: TResult[] = [];
  return {
    begin: () => true,
    accept: (result) => {
      results.push(result);
    },
    finish: () => results,
  };
}
