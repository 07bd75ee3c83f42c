import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function serializeMeta(meta: LogMeta) {
  if (!meta) return {};
  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value instanceof Error) {
      serialized[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'object' && value !== null) {
      serialized[key] = JSON.parse(JSON.stringify(value, (_key, val) => {
        if (val instanceof Error) {
          return { name: val.name, message: val.message, stack: val.stack };
        }
        return val;
      }));
    } else {
      serialized[key] = value;
    }
  }
  return serialized;
}

let consoleLevel: LogLevel = 'info';
let logFilePath: string | null = null;
// lines emitted before the run log is opened (config validation warnings)
let pendingLines: string[] | null = [];
const MAX_PENDING_LINES = 500;
let baseMeta: Record<string, unknown> = {};

function emit(level: LogLevel, msg: string, meta?: LogMeta) {
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    msg,
    ...baseMeta,
    ...serializeMeta(meta),
  };
  const line = JSON.stringify(entry);

  if (LEVEL_RANK[level] >= LEVEL_RANK[consoleLevel]) {
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else if (level === 'debug') {
      console.debug(line);
    } else {
      console.log(line);
    }
  }

  // the run log keeps everything from debug up
  if (logFilePath) {
    fs.appendFileSync(logFilePath, `${line}\n`);
  } else if (pendingLines && pendingLines.length < MAX_PENDING_LINES) {
    pendingLines.push(line);
  }
}

export const logger = {
  debug(msg: string, meta?: LogMeta) {
    emit('debug', msg, meta);
  },
  info(msg: string, meta?: LogMeta) {
    emit('info', msg, meta);
  },
  warn(msg: string, meta?: LogMeta) {
    emit('warn', msg, meta);
  },
  error(msg: string, meta?: LogMeta) {
    emit('error', msg, meta);
  },
};

export function setConsoleLogLevel(level: LogLevel) {
  consoleLevel = level;
}

export function logFileName(now: Date = new Date()) {
  const pad = (value: number) => String(value).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `trading_bot_${date}_${time}.log`;
}

/**
 * Starts writing every entry (debug and up) to a fresh file under `dir`.
 * Entries logged before the first call are written to the file first.
 * Returns the file path.
 */
export function configureLogFile(dir: string, now: Date = new Date()): string {
  fs.mkdirSync(dir, { recursive: true });
  logFilePath = path.join(dir, logFileName(now));
  if (pendingLines && pendingLines.length > 0) {
    fs.appendFileSync(logFilePath, `${pendingLines.join('\n')}\n`);
  }
  pendingLines = null;
  logger.info('log_file_opened', { event: 'log_file_opened', path: logFilePath });
  return logFilePath;
}

export function disableLogFile() {
  logFilePath = null;
  pendingLines = [];
}

export function setLogContext(meta: Record<string, unknown>) {
  baseMeta = { ...meta };
}

export function clearLogContext() {
  baseMeta = {};
}
