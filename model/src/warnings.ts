import { isQuiet } from "./config.js";

export type WarningLevel = "warn" | "info";
export type WarningHandler = (message: string, level: WarningLevel) => void;

const consoleHandler: WarningHandler = (message, level) => {
  if (level === "info") {
    console.info(`[geogrid] ${message}`);
  } else {
    console.warn(`[geogrid] ${message}`);
  }
};

let handler: WarningHandler = consoleHandler;

/** Installs a new sink for non-fatal diagnostics and returns the previous one. */
export function setWarningHandler(next: WarningHandler | null): WarningHandler {
  const previous = handler;
  handler = next ?? consoleHandler;
  return previous;
}

export function warn(message: string): void {
  if (handler === consoleHandler && isQuiet()) return;
  handler(message, "warn");
}

export function info(message: string): void {
  if (handler === consoleHandler && isQuiet()) return;
  handler(message, "info");
}
