import { activeDurationMs, formatDuration, pausedDurationMs, toMinutes } from './durations';
import { Session, TimeRecord, ValidationError } from './types';

export const REPORT_FORMATS = ['csv', 'html', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const REPORT_GRANULARITIES = ['task', 'record'] as const;
export type ReportGranularity = (typeof REPORT_GRANULARITIES)[number];

export interface ReportOptions {
  /** One row per task label (default) or one per record */
  granularity?: ReportGranularity;
  /** Only records starting at or after this moment */
  since?: Date;
  /** Only records starting before this moment */
  until?: Date;
  /** Count the open record as well, up to `now` */
  includeOpen?: boolean;
  now?: Date;
}

export interface ReportRow {
  taskLabel: string;
  recordCount: number;
  startTime: Date;
  /** Absent when the row includes the open record */
  endTime?: Date;
  activeMs: number;
  pausedMs: number;
  open: boolean;
}

export interface Report {
  granularity: ReportGranularity;
  since?: Date;
  until?: Date;
  rows: ReportRow[];
  totalActiveMs: number;
}

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

export function isReportGranularity(value: string): value is ReportGranularity {
  return (REPORT_GRANULARITIES as readonly string[]).includes(value);
}

/**
 * Fold the records of a Session into report rows
 */
export function buildReport(session: Session, options: ReportOptions = {}): Report {
  const granularity = options.granularity ?? 'task';
  const now = options.now ?? new Date();
  const { since, until } = options;

  if (since && until && until.getTime() <= since.getTime()) {
    throw new ValidationError('Report period is empty: "until" must be after "since"');
  }

  const candidates =
    options.includeOpen && session.activeRecord
      ? [...session.history, session.activeRecord]
      : session.history;

  const records = candidates.filter((record) => {
    const start = record.startTime.getTime();
    if (since && start < since.getTime()) return false;
    if (until && start >= until.getTime()) return false;
    return true;
  });

  const perRecord = records.map((record) => recordRow(record, now));
  const rows = granularity === 'record' ? perRecord : groupByTask(perRecord);

  return {
    granularity,
    ...(since ? { since } : {}),
    ...(until ? { until } : {}),
    rows,
    totalActiveMs: rows.reduce((total, row) => total + row.activeMs, 0),
  };
}

function recordRow(record: TimeRecord, now: Date): ReportRow {
  const open = record.status !== 'completed';
  return {
    taskLabel: record.taskLabel,
    recordCount: 1,
    startTime: record.startTime,
    ...(record.endTime ? { endTime: record.endTime } : {}),
    activeMs: activeDurationMs(record, open ? now : record.endTime),
    pausedMs: pausedDurationMs(record, now),
    open,
  };
}

/**
 * Merge rows sharing a task label, keeping the order in which labels first appear
 */
function groupByTask(rows: ReportRow[]): ReportRow[] {
  const byTask = new Map<string, ReportRow>();

  for (const row of rows) {
    const existing = byTask.get(row.taskLabel);
    if (!existing) {
      byTask.set(row.taskLabel, { ...row });
      continue;
    }

    const open = existing.open || row.open;
    const endTime = open ? undefined : latest(existing.endTime, row.endTime);
    byTask.set(row.taskLabel, {
      taskLabel: row.taskLabel,
      recordCount: existing.recordCount + row.recordCount,
      startTime: row.startTime < existing.startTime ? row.startTime : existing.startTime,
      ...(endTime ? { endTime } : {}),
      activeMs: existing.activeMs + row.activeMs,
      pausedMs: existing.pausedMs + row.pausedMs,
      open,
    });
  }

  return [...byTask.values()];
}

function latest(a?: Date, b?: Date): Date | undefined {
  if (!a) return b;
  if (!b) return a;
  return a.getTime() >= b.getTime() ? a : b;
}

// ============ Rendering ============

/**
 * Render a report in the requested format
 */
export function renderReport(report: Report, format: ReportFormat): string {
  switch (format) {
    case 'csv':
      return renderCsv(report);
    case 'html':
      return renderHtml(report);
    case 'json':
      return renderJson(report);
    default: {
      const unknown: never = format;
      throw new ValidationError(`Unknown report format "${unknown}"`);
    }
  }
}

const CSV_HEADER = ['task', 'records', 'start', 'end', 'active_minutes', 'paused_minutes'];

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function renderCsv(report: Report): string {
  const lines = [CSV_HEADER.join(',')];
  for (const row of report.rows) {
    lines.push(
      [
        row.taskLabel,
        String(row.recordCount),
        row.startTime.toISOString(),
        row.endTime?.toISOString() ?? '',
        String(toMinutes(row.activeMs)),
        String(toMinutes(row.pausedMs)),
      ]
        .map(csvField)
        .join(',')
    );
  }
  return lines.join('\n') + '\n';
}

export function renderJson(report: Report): string {
  const body = {
    granularity: report.granularity,
    since: report.since?.toISOString() ?? null,
    until: report.until?.toISOString() ?? null,
    totalActiveMinutes: toMinutes(report.totalActiveMs),
    rows: report.rows.map((row) => ({
      task: row.taskLabel,
      records: row.recordCount,
      start: row.startTime.toISOString(),
      end: row.endTime?.toISOString() ?? null,
      activeMinutes: toMinutes(row.activeMs),
      pausedMinutes: toMinutes(row.pausedMs),
      open: row.open,
    })),
  };
  return JSON.stringify(body, null, 2) + '\n';
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function displayLabel(taskLabel: string): string {
  return taskLabel === '' ? '(no task)' : taskLabel;
}

export function renderHtml(report: Report): string {
  const period = [
    report.since ? `from ${report.since.toISOString()}` : '',
    report.until ? `until ${report.until.toISOString()}` : '',
  ]
    .filter(Boolean)
    .join(' ');

  const rows = report.rows.map(
    (row) =>
      '<tr>' +
      `<td>${escapeHtml(displayLabel(row.taskLabel))}</td>` +
      `<td>${row.recordCount}</td>` +
      `<td>${row.startTime.toISOString()}</td>` +
      `<td>${row.endTime?.toISOString() ?? 'open'}</td>` +
      `<td>${formatDuration(row.activeMs)}</td>` +
      `<td>${formatDuration(row.pausedMs)}</td>` +
      '</tr>'
  );

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<title>Time report</title>',
    '</head>',
    '<body>',
    '<h1>Time report</h1>',
    ...(period ? [`<p>${period}</p>`] : []),
    '<table>',
    '<thead><tr><th>Task</th><th>Records</th><th>Start</th><th>End</th><th>Active</th><th>Paused</th></tr></thead>',
    '<tbody>',
    ...rows,
    '</tbody>',
    `<tfoot><tr><th colspan="4">Total</th><td>${formatDuration(report.totalActiveMs)}</td><td></td></tr></tfoot>`,
    '</table>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
