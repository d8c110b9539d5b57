// Restartable value sequences behind every generator accessor.
import { debug, warn } from "../utils/logger";

export type SequenceFactory<T> = () => Iterator<T>;

/**
 * Infinite counter: start, start + step, start + 2 * step, ...
 */
export function* incrementer(start: number = 0, step: number = 1): Generator<number, void, undefined> {
  let current = start;
  while (true) {
    yield current;
    current += step;
  }
}

/**
 * Finite counter over [start, end).
 */
export function* range(start: number, end: number): Generator<number, void, undefined> {
  for (let current = start; current < end; current++) {
    yield current;
  }
}

/**
 * Cartesian product of the given lists, rightmost list varying fastest.
 * Yields nothing when any list is empty.
 */
export function* product<T>(...lists: ReadonlyArray<readonly T[]>): Generator<T[], void, undefined> {
  if (lists.length === 0 || lists.some((list) => list.length === 0)) {
    return;
  }

  const indices = lists.map(() => 0);
  while (true) {
    yield indices.map((index, position) => lists[position][index]);

    // Advance the odometer from the right.
    let position = lists.length - 1;
    while (position >= 0) {
      indices[position] += 1;
      if (indices[position] < lists[position].length) {
        break;
      }
      indices[position] = 0;
      position -= 1;
    }
    if (position < 0) {
      return;
    }
  }
}

/**
 * Wraps a sequence factory. When the current iterator is exhausted a fresh one
 * is created from the factory and iteration continues, so finite sources
 * repeat their values instead of running out.
 */
export class SequenceGenerator<T> {
  private iterator: Iterator<T>;
  private restarts = 0;

  constructor(
    readonly name: string,
    private readonly factory: SequenceFactory<T>
  ) {
    this.iterator = factory();
  }

  /**
   * Number of times the sequence has wrapped around since creation or the last restart().
   */
  get restartCount(): number {
    return this.restarts;
  }

  next(): T {
    const current = this.iterator.next();
    if (!current.done) {
      return current.value;
    }

    this.iterator = this.factory();
    this.restarts += 1;
    if (this.restarts === 1) {
      warn("sequence", `"${this.name}" is exhausted and will now repeat values`);
    } else {
      debug("sequence", `"${this.name}" restarted`, { restarts: this.restarts });
    }

    const first = this.iterator.next();
    if (first.done) {
      throw new Error(`Sequence "${this.name}" produced no values.`);
    }
    return first.value;
  }

  /**
   * Starts over from the factory's first value.
   */
  restart(): void {
    this.iterator = this.factory();
    this.restarts = 0;
  }
}
