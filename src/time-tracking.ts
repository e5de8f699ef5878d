import { Logger } from 'pino';
import { activeDurationMs } from './durations';
import { getLogger } from './logger';
import { Report, ReportOptions, buildReport } from './report';
import { SessionStateMachine } from './state-machine';
import { TimeRecordStore } from './store';
import { Session, SessionAction, SessionState, TimeRecord } from './types';

/**
 * Options for commands that open a record
 */
export interface StartOptions {
  /** Falls back to the configured default task */
  task?: string;
  at?: Date;
}

export interface TimeTrackingOptions {
  /** Label used when start/switch are given none */
  defaultTask?: string;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Result of switching tasks
 */
export interface SwitchResult {
  sealed: TimeRecord;
  opened: TimeRecord;
}

/**
 * Snapshot of where the Session stands
 */
export interface SessionStatus {
  state: SessionState;
  activeRecord: TimeRecord | null;
  /** Active time of the open record so far */
  activeMs: number;
  allowed: readonly SessionAction[];
  lastRecord?: TimeRecord;
}

/**
 * TimeTrackingService runs one load → transition → save cycle per call, so
 * a rejected transition never reaches the store.
 */
export class TimeTrackingService {
  private defaultTask: string;
  private clock: () => Date;
  private logger: Logger;

  constructor(
    private store: TimeRecordStore,
    options: TimeTrackingOptions = {}
  ) {
    this.defaultTask = options.defaultTask ?? '';
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getLogger('time-tracking');
  }

  /**
   * Start tracking a task
   */
  start(options: StartOptions = {}): TimeRecord {
    const task = this.taskLabel(options.task);
    const record = this.transition('start', (machine) => machine.start(task, options.at));
    this.logger.info({ task }, 'started');
    return record;
  }

  /**
   * Seal the current record and start another task
   */
  switchTask(options: StartOptions = {}): SwitchResult {
    const task = this.taskLabel(options.task);
    const result = this.transition('switch', (machine) => machine.switch(task, options.at));
    this.logger.info({ from: result.sealed.taskLabel, to: task }, 'switched');
    return result;
  }

  pause(at?: Date): TimeRecord {
    const record = this.transition('pause', (machine) => machine.pause(at));
    this.logger.info({ task: record.taskLabel }, 'paused');
    return record;
  }

  resume(at?: Date): TimeRecord {
    const record = this.transition('resume', (machine) => machine.resume(at));
    this.logger.info({ task: record.taskLabel }, 'resumed');
    return record;
  }

  /**
   * Stop tracking; the record moves to history
   */
  end(at?: Date): TimeRecord {
    const record = this.transition('end', (machine) => machine.end(at));
    this.logger.info({ task: record.taskLabel }, 'ended');
    return record;
  }

  status(now?: Date): SessionStatus {
    const session = this.store.load();
    const machine = new SessionStateMachine(session, this.clock);
    const lastRecord = session.history[session.history.length - 1];
    return {
      state: machine.state,
      activeRecord: session.activeRecord,
      activeMs: machine.activeDurationMs(now),
      allowed: machine.allowedActions(),
      ...(lastRecord ? { lastRecord } : {}),
    };
  }

  /**
   * Build a report from the stored records
   */
  report(options: ReportOptions = {}): Report {
    const session = this.store.load();
    return buildReport(session, { ...options, now: options.now ?? this.clock() });
  }

  /**
   * Active time of a record, counting an open one up to now
   */
  activeDurationMs(record: TimeRecord, now?: Date): number {
    return activeDurationMs(record, record.endTime ?? now ?? this.clock());
  }

  private taskLabel(task?: string): string {
    const trimmed = task?.trim();
    return trimmed ? trimmed : this.defaultTask;
  }

  private transition<T>(action: SessionAction, apply: (machine: SessionStateMachine) => T): T {
    const session: Session = this.store.load();
    const machine = new SessionStateMachine(session, this.clock);
    const result = apply(machine);
    this.store.save(session);
    this.logger.debug({ action, state: machine.state, store: this.store.location }, 'saved');
    return result;
  }
}
