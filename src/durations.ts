import { TimeRecord } from './types';

/**
 * Sum of the running sub-intervals of a record. An interval that is still
 * running only counts when `now` is given.
 */
export function activeDurationMs(record: TimeRecord, now?: Date): number {
  let total = 0;
  let runningSince: Date | undefined;

  for (const event of record.events) {
    switch (event.kind) {
      case 'start':
      case 'resume':
        runningSince ??= event.at;
        break;
      case 'pause':
      case 'end':
        if (runningSince) {
          total += event.at.getTime() - runningSince.getTime();
          runningSince = undefined;
        }
        break;
    }
  }

  if (runningSince && now) {
    total += Math.max(0, now.getTime() - runningSince.getTime());
  }

  return total;
}

/**
 * Time between start and end (or `now`) that was not active
 */
export function pausedDurationMs(record: TimeRecord, now?: Date): number {
  const end = record.endTime ?? now;
  if (!end) {
    return 0;
  }
  const span = Math.max(0, end.getTime() - record.startTime.getTime());
  return Math.max(0, span - activeDurationMs(record, end));
}

export function toMinutes(ms: number): number {
  return Math.round(ms / 60000);
}

/**
 * Format a duration as H:MM
 */
export function formatDuration(ms: number): string {
  const totalMinutes = toMinutes(ms);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}`;
}
