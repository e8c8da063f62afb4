export interface ErrorLogger {
  error(message: string): void;
  warning(message: string): void;
}

export interface Logger extends ErrorLogger {
  notice(message: string): void;
  success(message: string): void;
  verbose(message: string): void;
}
