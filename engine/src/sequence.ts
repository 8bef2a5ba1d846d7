/**
 * Lazy, restartable sequences. Every iteration re-runs the factory, so a
 * sequence can be walked any number of times and always sees the current
 * state of whatever it was built over.
 */
export class LazySequence<T> implements Iterable<T> {
  private readonly factory: () => Iterator<T>;

  constructor(factory: () => Iterator<T>) {
    this.factory = factory;
  }

  static of<T>(source: Iterable<T>): LazySequence<T> {
    return new LazySequence(() => source[Symbol.iterator]());
  }

  [Symbol.iterator](): Iterator<T> {
    return this.factory();
  }

  map<U>(fn: (value: T) => U): LazySequence<U> {
    return map(fn, this);
  }

  filter(predicate: (value: T) => boolean): LazySequence<T> {
    return filter(predicate, this);
  }

  toArray(): T[] {
    return Array.from(this);
  }

  get size(): number {
    let n = 0;
    for (const _ of this) n++;
    return n;
  }
}

export function map<T, U>(fn: (value: T) => U, source: Iterable<T>): LazySequence<U> {
  return new LazySequence(function* () {
    for (const value of source) yield fn(value);
  });
}

export function filter<T>(predicate: (value: T) => boolean, source: Iterable<T>): LazySequence<T> {
  return new LazySequence(function* () {
    for (const value of source) if (predicate(value)) yield value;
  });
}

/** Integers in `[start, end)`; with one argument, `[0, start)`. */
export function iota(start: number, end?: number): LazySequence<number> {
  const [lo, hi] = end === undefined ? [0, start] : [start, end];
  return new LazySequence(function* () {
    for (let n = lo; n < hi; n++) yield n;
  });
}
