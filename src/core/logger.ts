type Level = "info" | "debug" | "warn" | "error";

const PREFIX = "[innodash]";

function log(level: Level, ...args: unknown[]) {
  switch (level) {
    case "debug":
      console.debug(`${PREFIX}[debug]`, ...args);
      break;
    case "warn":
      console.warn(`${PREFIX}[warn]`, ...args);
      break;
    case "error":
      console.error(`${PREFIX}[error]`, ...args);
      break;
    default:
      console.log(PREFIX, ...args);
  }
}

export function logInfo(...args: unknown[]) {
  log("info", ...args);
}

export function logDebug(enabled: boolean, ...args: unknown[]) {
  if (!enabled) return;
  log("debug", ...args);
}

export function logWarn(...args: unknown[]) {
  log("warn", ...args);
}

export function logError(...args: unknown[]) {
  log("error", ...args);
}
