export interface Clock {
  /** Wall-clock time in microseconds since the Unix epoch. */
  nowMicros(): number;
}

function createSystemClock(): Clock {
  const anchorMicros = BigInt(Date.now()) * 1000n;
  const anchorHr = process.hrtime.bigint();
  return {
    nowMicros() {
      const elapsedMicros = (process.hrtime.bigint() - anchorHr) / 1000n;
      return Number(anchorMicros + elapsedMicros);
    },
  };
}

/** Never goes backwards within a process, unlike `Date.now()`. */
export const systemClock: Clock = createSystemClock();

export function fixedClock(micros: number): Clock {
  return { nowMicros: () => micros };
}
