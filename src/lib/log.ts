export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type LogRecord = { level: LogLevel; event: string; time: string } & LogFields;

type LogSink = (record: LogRecord) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const consoleSink: LogSink = record => {
  const line = JSON.stringify(record);
  if (record.level === 'error') {
    // eslint-disable-next-line no-console
    console.error(line);
  } else {
    // eslint-disable-next-line no-console
    console.log(line);
  }
};

let threshold: LogLevel = 'info';
let sink: LogSink = consoleSink;

export function configureLogger(opts: { level?: LogLevel; sink?: LogSink | null } = {}): void {
  if (opts.level) threshold = opts.level;
  if (opts.sink !== undefined) sink = opts.sink ?? consoleSink;
}

function emit(level: LogLevel, event: string, fields: LogFields): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  sink({ ...fields, level, event, time: new Date().toISOString() });
}

export function logDebug(event: string, fields: LogFields = {}): void {
  emit('debug', event, fields);
}

export function logInfo(event: string, fields: LogFields = {}): void {
  emit('info', event, fields);
}

export function logWarn(event: string, fields: LogFields = {}): void {
  emit('warn', event, fields);
}

export function logError(event: string, fields: LogFields = {}): void {
  emit('error', event, fields);
}
