export type LogLevel = 'info' | 'warn';

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'warn') console.warn(line);
  else console.log(line);
};

export function createLogger(scope: string, sink: LogSink = consoleSink): Logger {
  const write = (level: LogLevel, message: string) => sink(level, `[${scope}] ${message}`);
  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message)
  };
}
