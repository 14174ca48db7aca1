/**
 * Injectable logging for the state and session stores
 *
 * The stores log through `logger`, which forwards to whatever the host
 * registered with setLogger(). Nothing is written until one is registered.
 */

export type LogMeta = Record<string, unknown>;

type LogFn = (message: string, meta?: LogMeta) => void;

export interface PersistenceLogger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
  // OAuth state traffic; falls back to the plain level when absent
  oauthDebug?: LogFn;
  oauthWarn?: LogFn;
  oauthError?: LogFn;
}

const silent: LogFn = () => undefined;

const SILENT_LOGGER: PersistenceLogger = {
  info: silent,
  warn: silent,
  error: silent,
  debug: silent
};

let sink: PersistenceLogger = SILENT_LOGGER;

export function setLogger(next: PersistenceLogger): void {
  sink = next;
}

export function getLogger(): PersistenceLogger {
  return sink;
}

export const logger: Required<PersistenceLogger> = {
  info: (message, meta) => sink.info(message, meta),
  warn: (message, meta) => sink.warn(message, meta),
  error: (message, meta) => sink.error(message, meta),
  debug: (message, meta) => sink.debug(message, meta),
  oauthDebug: (message, meta) => (sink.oauthDebug ?? sink.debug).call(sink, message, meta),
  oauthWarn: (message, meta) => (sink.oauthWarn ?? sink.warn).call(sink, message, meta),
  oauthError: (message, meta) => (sink.oauthError ?? sink.error).call(sink, message, meta)
};
