export type LogLevel = "info" | "warn" | "error";

export type LogEvent = { event: string } & Record<string, unknown>;

export type Log = (level: LogLevel, entry: LogEvent) => void;

const serializeError = (value: unknown): unknown => {
  if (value instanceof Error) {
    return "code" in value && typeof value.code === "string"
      ? { name: value.name, message: value.message, code: value.code }
      : { name: value.name, message: value.message };
  }
  return value;
};

/**
 * One JSON object per line; errors are reduced to name/message/code so
 * driver payloads never leak into the log stream.
 */
export const formatLogEvent = (entry: LogEvent): string =>
  JSON.stringify(entry, (_key, value: unknown) => serializeError(value));

export const consoleLog: Log = (level, entry) => {
  const line = formatLogEvent(entry);
  /* eslint-disable no-console */
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
  /* eslint-enable no-console */
};

export const silentLog: Log = () => undefined;
