export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogSource = 'server' | 'cli';
export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: string; // ISO string
  source: LogSource;
  runId?: string;
  requestId?: string;
  tags?: string[];
  context?: Record<string, unknown>;
  sequence?: number;
};
