/**
 * Wall-clock time source for the line.
 *
 * Everything that stamps a scan, buckets it by hour or measures elapsed job
 * time reads time through a Clock so tests can pin it with a manual clock.
 */

export interface Clock {
  /** Epoch milliseconds. */
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}

const HOUR_MS = 60 * 60 * 1000;

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** Local wall-clock hour (0-23). */
export const hourOf = (epochMs: number): number => new Date(epochMs).getHours();

/** Local calendar date as YYYY-MM-DD. */
export const dateKeyOf = (epochMs: number): string => {
  const d = new Date(epochMs);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
};

export interface HourSlot {
  date: string;
  hour: number;
}

export const hourSlotOf = (epochMs: number): HourSlot => ({
  date: dateKeyOf(epochMs),
  hour: hourOf(epochMs),
});

/** The hour before `epochMs`; at midnight this is 23:00 of the previous day. */
export const previousHourSlotOf = (epochMs: number): HourSlot => hourSlotOf(epochMs - HOUR_MS);

/** Compact local stamp used for generated job ids: YYYYMMDD_HHMMSS. */
export const compactStamp = (epochMs: number): string => {
  const d = new Date(epochMs);
  return (
    `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}` +
    `_${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`
  );
};

export const toIso = (epochMs: number): string => new Date(epochMs).toISOString();
