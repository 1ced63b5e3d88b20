/**
 * Simstage Logger
 *
 * - Console output: human readable, one line per entry plus data/error lines
 * - File output: structured JSONL, one file per day, rotated by size
 */

import { appendFileSync, mkdirSync, existsSync, statSync, renameSync, readdirSync, unlinkSync, readFileSync } from 'fs';
import { join } from 'path';
import { SIM_PATHS } from './sim-paths.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogTimestamp {
  utc: string;
  local: string;
  tz: string;
  nowMs: number;
}

export interface LogEntry {
  timestamp: LogTimestamp;
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  logDir: string;
  maxFileSizeMB: number;
  maxFiles: number;
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: SIM_PATHS.logs.dir,
  maxFileSizeMB: 10,
  maxFiles: 30,
  level: 'info',
  enableConsole: true,
  enableFile: false,
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // gray
  info: '\x1b[32m',    // green
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
  fatal: '\x1b[35m',   // magenta
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function currentTimestamp(now: number = Date.now()): LogTimestamp {
  const tz = Intl.DateTimeFormat().resolvedOptions().timeZone;
  const date = new Date(now);
  const parts = new Intl.DateTimeFormat('sv-SE', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(date);

  const get = (type: string) => parts.find(p => p.type === type)?.value ?? '00';
  const ms = String(date.getMilliseconds()).padStart(3, '0');

  return {
    utc: date.toISOString(),
    local: `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}.${ms}`,
    tz,
    nowMs: now,
  };
}

export class SimLogger {
  private config: LoggerConfig;
  private currentLogFile: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.prepareLogDir();
    this.currentLogFile = this.getLogFileName();
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
    this.prepareLogDir();
    this.currentLogFile = this.getLogFileName();
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.config.level];
  }

  log(level: LogLevel, module: string, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: currentTimestamp(),
      level,
      module,
      message,
      data,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (this.config.enableFile) {
      this.logToFile(JSON.stringify(entry));
    }

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }
  }

  debug(module: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', module, message, data);
  }

  info(module: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', module, message, data);
  }

  warn(module: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', module, message, data);
  }

  error(module: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('error', module, message, data, error);
  }

  fatal(module: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('fatal', module, message, data, error);
  }

  module(moduleName: string): ModuleLogger {
    return new ModuleLogger(this, moduleName);
  }

  readLogs(options: {
    level?: LogLevel;
    module?: string;
    since?: Date;
    limit?: number;
  } = {}): LogEntry[] {
    const entries: LogEntry[] = [];

    for (const file of this.getLogFiles()) {
      const lines = this.readLogFile(file).split('\n').filter(Boolean);

      for (const line of lines) {
        const entry = parseLogLine(line);
        if (!entry) {
          continue;
        }
        if (options.level && LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[options.level]) {
          continue;
        }
        if (options.module && entry.module !== options.module) {
          continue;
        }
        if (options.since && entry.timestamp.nowMs < options.since.getTime()) {
          continue;
        }
        entries.push(entry);
      }
    }

    entries.sort((a, b) => b.timestamp.nowMs - a.timestamp.nowMs);

    if (options.limit !== undefined) {
      return entries.slice(0, options.limit);
    }
    return entries;
  }

  cleanup(): void {
    const files = this.getLogFiles();

    if (files.length > this.config.maxFiles) {
      const toDelete = files.slice(0, files.length - this.config.maxFiles);
      for (const file of toDelete) {
        try {
          unlinkSync(file);
        } catch (err) {
          console.error('Failed to delete log file:', file, err);
        }
      }
    }
  }

  private prepareLogDir(): void {
    if (!this.config.enableFile || existsSync(this.config.logDir)) {
      return;
    }
    try {
      mkdirSync(this.config.logDir, { recursive: true });
    } catch (err) {
      console.error('Failed to create log directory, file logging disabled:', err);
      this.config.enableFile = false;
    }
  }

  private getLogFileName(): string {
    const date = new Date().toISOString().split('T')[0];
    return join(this.config.logDir, `simstage-${date}.log`);
  }

  private logToFile(line: string): void {
    try {
      const todayFile = this.getLogFileName();
      if (todayFile !== this.currentLogFile) {
        this.currentLogFile = todayFile;
        this.cleanup();
      }

      if (existsSync(this.currentLogFile)) {
        const sizeMB = statSync(this.currentLogFile).size / (1024 * 1024);
        if (sizeMB >= this.config.maxFileSizeMB) {
          this.rotateLog();
        }
      }

      appendFileSync(this.currentLogFile, line + '\n', 'utf-8');
    } catch (err) {
      console.error('Failed to write log file:', err);
    }
  }

  private rotateLog(): void {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const rotatedName = this.currentLogFile.replace(/\.log$/, `-${timestamp}.log`);
    renameSync(this.currentLogFile, rotatedName);
  }

  private logToConsole(entry: LogEntry): void {
    const t = entry.timestamp;
    const ts = `[${t.utc} | ${t.local} | ${t.tz}]`;
    const levelStr = `[${entry.level.toUpperCase()}]`;
    const moduleStr = `[${entry.module}]`;

    console.log(`${LEVEL_COLOR[entry.level]}${ts}\x1b[0m ${levelStr} ${moduleStr} ${entry.message}`);

    if (entry.data && Object.keys(entry.data).length > 0) {
      console.log(`  → data: ${JSON.stringify(entry.data)}`);
    }

    if (entry.error) {
      console.log(`  → error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        const stackLines = entry.error.stack.split('\n').slice(1, 4);
        stackLines.forEach(line => console.log(`    ${line.trim()}`));
      }
    }
  }

  private getLogFiles(): string[] {
    if (!existsSync(this.config.logDir)) {
      return [];
    }
    return readdirSync(this.config.logDir)
      .filter(entry => entry.startsWith('simstage-') && entry.endsWith('.log'))
      .map(entry => join(this.config.logDir, entry))
      .sort();
  }

  private readLogFile(filePath: string): string {
    return readFileSync(filePath, 'utf-8');
  }
}

function parseLogLine(line: string): LogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    // partial line from an interrupted write
    return null;
  }
  if (!isLogEntry(parsed)) {
    return null;
  }
  return parsed;
}

function isLogEntry(value: unknown): value is LogEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('level' in value) || typeof value.level !== 'string' || !isLogLevel(value.level)) return false;
  if (!('module' in value) || typeof value.module !== 'string') return false;
  if (!('message' in value) || typeof value.message !== 'string') return false;
  if (!('timestamp' in value) || typeof value.timestamp !== 'object' || value.timestamp === null) return false;
  return 'nowMs' in value.timestamp && typeof value.timestamp.nowMs === 'number';
}

export class ModuleLogger {
  constructor(private logger: SimLogger, private moduleName: string) {}

  get name(): string {
    return this.moduleName;
  }

  isEnabled(level: LogLevel): boolean {
    return this.logger.isEnabled(level);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(this.moduleName, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(this.moduleName, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(this.moduleName, message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.logger.error(this.moduleName, message, error, data);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.logger.fatal(this.moduleName, message, error, data);
  }
}

export const logger = new SimLogger();
