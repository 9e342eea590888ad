// Debug Logging Utility for the printer driver
// Centralized logging with environment-aware output

import { environment, EnvironmentConfig } from '../../config/environment';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LogContext {
  sessionId?: string;
  node?: string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
  timestamp: string;
  component?: string;
  sessionId?: string;
  node?: string;
}

export function levelForEnvironment(env: Pick<EnvironmentConfig, 'NODE_ENV' | 'DEBUG_LOGGING'>): LogLevel {
  if (env.DEBUG_LOGGING) return LogLevel.DEBUG;
  if (env.NODE_ENV === 'development') return LogLevel.DEBUG;
  if (env.NODE_ENV === 'test') return LogLevel.WARN;
  return LogLevel.ERROR; // Production
}

class DebugLogger {
  private static instance: DebugLogger;
  private currentLevel: LogLevel = LogLevel.INFO;
  private logs: LogEntry[] = [];
  private maxLogs: number = 1000;

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  constructor() {
    this.setLogLevel(levelForEnvironment(environment));
  }

  setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.currentLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.currentLevel;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    data?: unknown,
    component?: string,
    context?: LogContext
  ): LogEntry {
    return {
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
      component,
      sessionId: context?.sessionId,
      node: context?.node,
    };
  }

  private addToLog(entry: LogEntry): void {
    this.logs.push(entry);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const component = entry.component ? `[${entry.component}]` : '';
    const session = entry.sessionId ? `[Session:${entry.sessionId}]` : '';
    const node = entry.node ? `[Node:${entry.node}]` : '';

    return `${timestamp} ${component}${session}${node} ${entry.message}`;
  }

  debug(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;

    const entry = this.createLogEntry(LogLevel.DEBUG, message, data, component, context);
    this.addToLog(entry);

    console.debug(this.formatMessage(entry), data ?? '');
  }

  info(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    const entry = this.createLogEntry(LogLevel.INFO, message, data, component, context);
    this.addToLog(entry);

    console.info(this.formatMessage(entry), data ?? '');
  }

  warn(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.WARN)) return;

    const entry = this.createLogEntry(LogLevel.WARN, message, data, component, context);
    this.addToLog(entry);

    console.warn(this.formatMessage(entry), data ?? '');
  }

  error(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const entry = this.createLogEntry(LogLevel.ERROR, message, data, component, context);
    this.addToLog(entry);

    console.error(this.formatMessage(entry), data ?? '');
  }

  // Byte-level trace of everything handed to a sink
  byteWrite(length: number, preview: string, component?: string, context?: LogContext): void {
    if (length === 0) {
      this.debug('Wrote NO bytes', undefined, component, context);
      return;
    }
    this.debug(`Writing ${length} bytes: ${preview}`, undefined, component, context);
  }

  nodeOperation(name: string, data?: unknown, sessionId?: string): void {
    this.debug(`Write: ${name}`, data, 'NodeInterpreter', { sessionId, node: name });
  }

  // Get logs for debugging
  getLogs(level?: LogLevel, component?: string, limit?: number): LogEntry[] {
    let filteredLogs = this.logs;

    if (level !== undefined) {
      filteredLogs = filteredLogs.filter(log => log.level >= level);
    }

    if (component) {
      filteredLogs = filteredLogs.filter(log => log.component === component);
    }

    if (limit) {
      filteredLogs = filteredLogs.slice(-limit);
    }

    return filteredLogs;
  }

  // Clear logs
  clearLogs(): void {
    this.logs = [];
  }

  // Export logs for debugging
  exportLogs(): string {
    return JSON.stringify(this.logs, null, 2);
  }
}

// Create and export singleton instance
export const debugLogger = DebugLogger.getInstance();

/**
 * Hex preview of a byte buffer for trace output, cut at `max` bytes
 */
export function hexPreview(data: Uint8Array, max: number = 32): string {
  const shown = Array.from(data.subarray(0, max), (byte) => byte.toString(16).padStart(2, '0'));
  return data.length > max ? `${shown.join(' ')} ...` : shown.join(' ');
}
