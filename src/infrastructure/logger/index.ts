import makeLogger from "./logger";

export { default as makeLogger, pinoLogger } from "./logger";
export type { LogData, Logger, LogLevel, LogMethod } from "./types";

/** Logger compartilhado; componentes aceitam outro via injeção. */
export const logger = makeLogger();
