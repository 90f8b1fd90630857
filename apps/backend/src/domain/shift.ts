import type { HourBucket } from "./job";

export interface ShiftStat {
  date: string;
  total_shippers: number;
  total_pieces: number;
  total_pass: number;
  total_fail: number;
  jobs_completed: number;
}

export interface ShiftHourBucket extends HourBucket {
  date: string;
  hour: number;
}

export interface HourlyStat {
  hour: number;
  label: string;
  shippers: number;
  pieces: number;
  cumulative_pieces: number;
}

export interface HourlyStats {
  date: string;
  hours: HourlyStat[];
  total_shippers: number;
  total_pieces: number;
}

export const emptyShift = (date: string): ShiftStat => ({
  date,
  total_shippers: 0,
  total_pieces: 0,
  total_pass: 0,
  total_fail: 0,
  jobs_completed: 0,
});

export const hourLabel = (hour: number): string => `${String(hour).padStart(2, "0")}:00`;

/**
 * Per-hour production for the shift window [startHour, endHour], with a
 * running piece total. Hours without production report zero.
 */
export const buildHourlyStats = (
  date: string,
  buckets: readonly ShiftHourBucket[],
  startHour: number,
  endHour: number,
): HourlyStats => {
  const byHour = new Map<number, ShiftHourBucket>();
  for (const bucket of buckets) {
    if (bucket.date === date) byHour.set(bucket.hour, bucket);
  }

  const hours: HourlyStat[] = [];
  let cumulative = 0;
  let totalShippers = 0;
  for (let hour = startHour; hour <= endHour; hour += 1) {
    const bucket = byHour.get(hour);
    const shippers = bucket?.shippers ?? 0;
    const pieces = bucket?.pieces ?? 0;
    cumulative += pieces;
    totalShippers += shippers;
    hours.push({ hour, label: hourLabel(hour), shippers, pieces, cumulative_pieces: cumulative });
  }

  return { date, hours, total_shippers: totalShippers, total_pieces: cumulative };
};
