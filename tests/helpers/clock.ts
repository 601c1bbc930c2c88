export interface TestClock {
     now: () => Date;
     advance: (ms: number) => void;
}

/** Deterministic clock for services that take a `clock` option. */
export function createTestClock(start: string = '2026-03-01T10:00:00.000Z'): TestClock {
     let current = new Date(start).getTime();
     return {
          now: () => new Date(current),
          advance: (ms: number) => {
               current += ms;
          },
     };
}

/** Sequential ids (res-1, res-2, ...) for predictable reservation ids. */
export function sequentialIds(prefix: string = 'res'): () => string {
     let n = 0;
     return () => {
          n += 1;
          return `${prefix}-${n}`;
     };
}
