export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

export interface LineSink {
  write(chunk: string): unknown;
}

export interface LogStreams {
  stdout: LineSink;
  stderr: LineSink;
}

export function createProcessLogger(
  streams: LogStreams = { stdout: process.stdout, stderr: process.stderr },
  now: () => Date = () => new Date()
): Logger {
  const line = (message: string) => `${now().toISOString()} ${message}\n`;
  return {
    info: (message) => {
      streams.stdout.write(line(message));
    },
    error: (message) => {
      streams.stderr.write(line(message));
    }
  };
}

export function createSilentLogger(): Logger {
  return {
    info: () => undefined,
    error: () => undefined
  };
}
