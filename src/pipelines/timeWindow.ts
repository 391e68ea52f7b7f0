import { EpisodeRecord } from '../mediathek/types';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TimeWindow {
  start: Date;
  end: Date;
}

/**
 * Resolves the broadcast window from the command line options
 * @param start - Window start, if given
 * @param end - Window end, if given
 * @param intervalDays - Window length used when only one bound is given
 * @returns The window, or null when no bound is given
 */
export function resolveTimeWindow(
  start: Date | undefined,
  end: Date | undefined,
  intervalDays: number
): TimeWindow | null {
  if (intervalDays < 0 || !Number.isFinite(intervalDays)) {
    throw new Error(`Interval must be a non-negative number of days, got ${intervalDays}`);
  }

  if (start && end) {
    if (end.getTime() < start.getTime()) {
      throw new Error('End time is before start time.');
    }
    return { start, end };
  }
  if (start) {
    return { start, end: new Date(start.getTime() + intervalDays * DAY_MS) };
  }
  if (end) {
    return { start: new Date(end.getTime() - intervalDays * DAY_MS), end };
  }
  return null;
}

/**
 * Keeps the records broadcast within the window (both ends inclusive)
 */
export function filterByTimeWindow(
  records: readonly EpisodeRecord[],
  window: TimeWindow | null
): EpisodeRecord[] {
  if (!window) return [...records];

  const start = window.start.getTime();
  const end = window.end.getTime();
  return records.filter((record) => {
    const time = record.timestamp.getTime();
    return time >= start && time <= end;
  });
}
