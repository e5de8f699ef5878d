import { SegmentEventKind, Session, TimeRecord } from './types';

const FOLLOWS: Readonly<Record<SegmentEventKind, readonly SegmentEventKind[]>> = {
  start: [],
  pause: ['start', 'resume'],
  resume: ['pause'],
  end: ['start', 'pause', 'resume'],
};

/**
 * Check the invariants of a single record, returning a description of each
 * violation found.
 */
export function checkRecord(record: TimeRecord): string[] {
  const issues: string[] = [];
  const label = record.taskLabel === '' ? '(no task)' : `"${record.taskLabel}"`;

  if (record.status === 'completed' && !record.endTime) {
    issues.push(`record ${label} is completed but has no end time`);
  }
  if (record.status !== 'completed' && record.endTime) {
    issues.push(`record ${label} has an end time but is ${record.status}`);
  }
  if (record.endTime && record.endTime.getTime() < record.startTime.getTime()) {
    issues.push(`record ${label} ends before it starts`);
  }

  const [first, ...rest] = record.events;
  if (!first || first.kind !== 'start') {
    issues.push(`record ${label} must begin with a start event`);
    return issues;
  }
  if (first.at.getTime() !== record.startTime.getTime()) {
    issues.push(`record ${label} start event does not match its start time`);
  }

  let previous = first;
  for (const event of rest) {
    if (!FOLLOWS[event.kind].includes(previous.kind)) {
      issues.push(`record ${label} has ${event.kind} after ${previous.kind}`);
    }
    if (event.at.getTime() < previous.at.getTime()) {
      issues.push(`record ${label} has events out of order`);
    }
    previous = event;
  }

  const expected =
    previous.kind === 'end' ? 'completed' : previous.kind === 'pause' ? 'paused' : 'running';
  if (record.status !== expected) {
    issues.push(`record ${label} is ${record.status} but its last event is ${previous.kind}`);
  }
  if (
    previous.kind === 'end' &&
    record.endTime &&
    previous.at.getTime() !== record.endTime.getTime()
  ) {
    issues.push(`record ${label} end event does not match its end time`);
  }

  return issues;
}

/**
 * Check the invariants of a whole Session
 */
export function checkSession(session: Session): string[] {
  const issues: string[] = [];

  if (session.activeRecord) {
    if (session.activeRecord.status === 'completed') {
      issues.push('the active record is already completed');
    }
    issues.push(...checkRecord(session.activeRecord));
  }

  session.history.forEach((record, index) => {
    if (record.status !== 'completed') {
      issues.push(`history entry ${index + 1} is ${record.status}, expected completed`);
    }
    issues.push(...checkRecord(record));

    const previousEnd = session.history[index - 1]?.endTime;
    if (previousEnd && record.startTime.getTime() < previousEnd.getTime()) {
      issues.push(`history entry ${index + 1} starts before entry ${index} ends`);
    }
  });

  const active = session.activeRecord;
  const lastEnd = session.history[session.history.length - 1]?.endTime;
  if (active && lastEnd && active.startTime.getTime() < lastEnd.getTime()) {
    issues.push('the active record starts before the last history entry ends');
  }

  return issues;
}
