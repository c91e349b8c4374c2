export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Registro estruturado. `type` agrupa eventos (NOWPAYMENTS_RETRY, ...) e
 * `payload` nunca deve conter API key ou IPN secret.
 */
export interface LogData {
  type?: string;
  message?: string;
  payload?: Record<string, unknown>;
  error?: unknown;
  [key: string]: unknown;
}

export type LogMethod = {
  (logData: LogData): void;
  (message: string): void;
  (context: Partial<LogData>, message: string): void;
};

export type Logger = Record<LogLevel, LogMethod>;
