// Session state machine
export { SessionStateMachine, ALLOWED_ACTIONS, sessionState } from './state-machine';

// Stores
export {
  TimeRecordStore,
  YamlFileStore,
  STORE_VERSION,
  parseSession,
  stringifySession,
  writeFileAtomic,
} from './store';
export { SqliteStore } from './database';
export { checkRecord, checkSession } from './validation';

// Time tracking service
export {
  TimeTrackingService,
  StartOptions,
  TimeTrackingOptions,
  SwitchResult,
  SessionStatus,
} from './time-tracking';

// Reports
export {
  Report,
  ReportRow,
  ReportOptions,
  ReportFormat,
  ReportGranularity,
  REPORT_FORMATS,
  REPORT_GRANULARITIES,
  buildReport,
  renderReport,
  renderCsv,
  renderHtml,
  renderJson,
} from './report';
export { activeDurationMs, pausedDurationMs, formatDuration } from './durations';

// Configuration and logging
export {
  TockConfig,
  ConfigFile,
  StoreBackend,
  loadConfig,
  mergeConfig,
  defaultConfig,
  readConfigFile,
  checkConfigFile,
  writeConfigFile,
  getConfigValue,
} from './config';
export { initLogger, getLogger, parseLogLevel, envLogLevel, LogLevel } from './logger';

// Types
export {
  TimeRecord,
  SegmentEvent,
  SegmentEventKind,
  RecordStatus,
  Session,
  SessionState,
  SessionAction,
  emptySession,
  TockError,
  ValidationError,
  InvalidTransitionError,
  CorruptStoreError,
  StoreWriteError,
  ConfigError,
} from './types';
