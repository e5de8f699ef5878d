import { activeDurationMs } from './durations';
import {
  InvalidTransitionError,
  Session,
  SessionAction,
  SessionState,
  TimeRecord,
  ValidationError,
} from './types';

/**
 * Actions accepted in each state
 */
export const ALLOWED_ACTIONS: Readonly<Record<SessionState, readonly SessionAction[]>> = {
  idle: ['start'],
  running: ['switch', 'pause', 'end'],
  paused: ['switch', 'resume', 'end'],
  ended: ['start'],
};

export function sessionState(session: Session): SessionState {
  if (session.activeRecord) {
    return session.activeRecord.status === 'paused' ? 'paused' : 'running';
  }
  return session.history.length > 0 ? 'ended' : 'idle';
}

/**
 * SessionStateMachine applies start/switch/pause/resume/end to a Session it
 * is handed. Every check runs before the Session is touched, so a rejected
 * call leaves it exactly as it was.
 */
export class SessionStateMachine {
  constructor(
    private session: Session,
    private clock: () => Date = () => new Date()
  ) {}

  get state(): SessionState {
    return sessionState(this.session);
  }

  get activeRecord(): TimeRecord | null {
    return this.session.activeRecord;
  }

  allowedActions(): readonly SessionAction[] {
    return ALLOWED_ACTIONS[this.state];
  }

  /**
   * Open a new running record
   */
  start(taskLabel: string, at?: Date): TimeRecord {
    const time = this.prepare('start', at);
    const record = openRecord(taskLabel, time);
    this.session.activeRecord = record;
    return record;
  }

  /**
   * Seal the open record and open a new one for another task.
   * Returns both the sealed and the new record.
   */
  switch(taskLabel: string, at?: Date): { sealed: TimeRecord; opened: TimeRecord } {
    const time = this.prepare('switch', at);
    const sealed = this.seal('switch', time);
    const opened = openRecord(taskLabel, time);
    this.session.activeRecord = opened;
    return { sealed, opened };
  }

  pause(at?: Date): TimeRecord {
    const time = this.prepare('pause', at);
    const record = this.requireActive('pause');
    record.status = 'paused';
    record.events.push({ kind: 'pause', at: time });
    return record;
  }

  resume(at?: Date): TimeRecord {
    const time = this.prepare('resume', at);
    const record = this.requireActive('resume');
    record.status = 'running';
    record.events.push({ kind: 'resume', at: time });
    return record;
  }

  /**
   * Seal the open record and move it to history
   */
  end(at?: Date): TimeRecord {
    const time = this.prepare('end', at);
    return this.seal('end', time);
  }

  /**
   * Active time of the open record so far, or 0 when nothing is open
   */
  activeDurationMs(now?: Date): number {
    const record = this.session.activeRecord;
    return record ? activeDurationMs(record, now ?? this.clock()) : 0;
  }

  private prepare(action: SessionAction, at?: Date): Date {
    const state = this.state;
    const allowed = ALLOWED_ACTIONS[state];
    if (!allowed.includes(action)) {
      throw new InvalidTransitionError(state, action, allowed);
    }

    const time = at ?? this.clock();
    if (Number.isNaN(time.getTime())) {
      throw new ValidationError(`Cannot ${action}: invalid timestamp`);
    }

    const latest = this.latestMoment();
    if (latest && time.getTime() < latest.getTime()) {
      throw new ValidationError(
        `Cannot ${action} at ${time.toISOString()}: ` +
          `it precedes the last recorded moment ${latest.toISOString()}`
      );
    }

    // a sealed record must have a positive length
    const open = this.session.activeRecord;
    if ((action === 'end' || action === 'switch') && open) {
      if (time.getTime() <= open.startTime.getTime()) {
        throw new ValidationError(
          `Cannot ${action} at ${time.toISOString()}: ` +
            `the record started at that moment and would be empty`
        );
      }
    }

    return time;
  }

  private latestMoment(): Date | undefined {
    const active = this.session.activeRecord;
    if (active) {
      const last = active.events[active.events.length - 1];
      return last?.at ?? active.startTime;
    }
    const previous = this.session.history[this.session.history.length - 1];
    return previous?.endTime;
  }

  private requireActive(action: SessionAction): TimeRecord {
    const record = this.session.activeRecord;
    if (!record) {
      throw new InvalidTransitionError(this.state, action, this.allowedActions());
    }
    return record;
  }

  private seal(action: SessionAction, time: Date): TimeRecord {
    const record = this.requireActive(action);
    record.status = 'completed';
    record.endTime = time;
    record.events.push({ kind: 'end', at: time });
    this.session.history.push(record);
    this.session.activeRecord = null;
    return record;
  }
}

function openRecord(taskLabel: string, time: Date): TimeRecord {
  return {
    taskLabel,
    startTime: time,
    status: 'running',
    events: [{ kind: 'start', at: time }],
  };
}
