export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  id: string;
  level: LogLevel;
  tag: string;
  message: string;
  timestamp: number;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const listeners = new Set<(event: LogEvent) => void>();
const buffer: LogEvent[] = [];
const MAX_BUFFER = 50;
let counter = 0;
let consoleLevel: LogLevel = "info";

const enqueue = (event: LogEvent) => {
  buffer.push(event);
  if (buffer.length > MAX_BUFFER) {
    buffer.shift();
  }
};

const emit = (event: LogEvent) => {
  enqueue(event);
  listeners.forEach((listener) => listener(event));
};

const formatConsoleMessage = (event: LogEvent) => {
  const time = new Date(event.timestamp).toISOString();
  return `${time} [${event.level}] [${event.tag}] ${event.message}`;
};

const logToConsole = (event: LogEvent) => {
  if (process.env.NODE_ENV === "production" || LEVEL_ORDER[event.level] < LEVEL_ORDER[consoleLevel]) {
    return;
  }

  const formatted = formatConsoleMessage(event);
  const payload = event.data !== undefined ? [formatted, event.data] : [formatted];

  switch (event.level) {
    case "warn":
      console.warn(...payload);
      break;
    case "error":
      console.error(...payload);
      break;
    case "debug":
      console.debug(...payload);
      break;
    case "info":
    default:
      console.log(...payload);
      break;
  }
};

const createLogEvent = (level: LogLevel, tag: string, message: string, data?: unknown) => {
  const event: LogEvent = {
    id: `${Date.now()}-${counter++}`,
    level,
    tag,
    message,
    data,
    timestamp: Date.now(),
  };

  logToConsole(event);
  emit(event);
  return event;
};

export const logger = {
  debug: (tag: string, message: string, data?: unknown) => createLogEvent("debug", tag, message, data),
  info: (tag: string, message: string, data?: unknown) => createLogEvent("info", tag, message, data),
  warn: (tag: string, message: string, data?: unknown) => createLogEvent("warn", tag, message, data),
  error: (tag: string, message: string, data?: unknown) => createLogEvent("error", tag, message, data),
  /** Minimum level written to the console; the buffer and listeners see everything. */
  setConsoleLevel: (level: LogLevel) => {
    consoleLevel = level;
  },
  subscribe: (listener: (event: LogEvent) => void) => {
    listeners.add(listener);
    return () => listeners.delete(listener);
  },
  getBuffer: () => buffer.slice(-MAX_BUFFER),
};
