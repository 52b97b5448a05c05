export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  metadata: Record<string, unknown>;
}

export type LogSink = (line: string, entry: LogEntry) => void;

const consoleSink: LogSink = (line, entry) => {
  if (entry.level === 'error') {
    console.error(line);
    return;
  }
  console.log(line);
};

let sink: LogSink = consoleSink;

/** Redirects log lines, e.g. to capture them in tests. Pass nothing to restore console output. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

export function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    metadata: metadata ?? {}
  };

  sink(JSON.stringify(entry), entry);
}
