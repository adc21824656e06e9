/**
 * In-process debug log. Ink owns stdout while the editor runs, so entries are
 * kept in memory and shown by the DebugPanel instead of being printed.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  id: string;
  level: LogLevel;
  message: string;
  timestamp: Date;
  data?: unknown;
}

type LogSubscriber = (logs: LogEntry[]) => void;

class DebugLogger {
  private logs: LogEntry[] = [];
  private subscribers = new Set<LogSubscriber>();
  private maxLogs = 50;
  private counter = 0;

  private emit(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      id: `${Date.now()}-${this.counter++}`,
      level,
      message,
      timestamp: new Date(),
      data,
    };
    this.logs = [...this.logs.slice(-(this.maxLogs - 1)), entry];
    this.subscribers.forEach(fn => fn(this.logs));
  }

  debug(message: string, data?: unknown) {
    this.emit('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.emit('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.emit('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.emit('error', message, data);
  }

  getLogs(): LogEntry[] {
    return this.logs;
  }

  subscribe(fn: LogSubscriber): () => void {
    this.subscribers.add(fn);
    fn(this.logs);
    return () => {
      this.subscribers.delete(fn);
    };
  }

  clear() {
    this.logs = [];
    this.subscribers.forEach(fn => fn(this.logs));
  }
}

export const logger = new DebugLogger();
