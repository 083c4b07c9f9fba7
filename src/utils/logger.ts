// console-backed logger; debug lines only print when LOG_LEVEL=debug
const debugEnabled = (): boolean => (process.env.LOG_LEVEL || "").toLowerCase() === "debug";

export const logger = {
  debug(...args: unknown[]): void {
    if (debugEnabled()) console.debug(...args);
  },
  info(...args: unknown[]): void {
    console.log(...args);
  },
  warn(...args: unknown[]): void {
    console.warn(...args);
  },
  error(...args: unknown[]): void {
    console.error(...args);
  },
};
