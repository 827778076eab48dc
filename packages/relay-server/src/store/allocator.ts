// Shared by every channel of one store, so ids are unique store-wide.
export class IdentityAllocator {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }

  current(): number {
    return this.last;
  }
}

export type Clock = () => number;

/** Wraps a wall clock so successive readings never go backwards. */
export function monotonicClock(now: Clock = Date.now): Clock {
  let last = 0;
  return () => {
    last = Math.max(last, now());
    return last;
  };
}
