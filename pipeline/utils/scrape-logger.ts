export interface ScrapeLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
  debug: (message: string) => void;
}

interface ConsoleLoggerOptions {
  verbose?: boolean;
  now?: () => Date;
}

export const createConsoleLogger = (options?: ConsoleLoggerOptions): ScrapeLogger => {
  const now = options?.now ?? (() => new Date());
  const line = (level: string, message: string) =>
    `${now().toISOString()} [${level}] ${message}`;

  return {
    info: (message) => console.log(line("INFO", message)),
    warn: (message) => console.warn(line("WARNING", message)),
    debug: options?.verbose
      ? (message) => console.log(line("DEBUG", message))
      : () => {}
  };
};

export const silentLogger: ScrapeLogger = {
  info: () => {},
  warn: () => {},
  debug: () => {}
};
