export interface EdaLogger {
  log(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export const consoleLogger: EdaLogger = console;

export const silentLogger: EdaLogger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
