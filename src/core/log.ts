// Debug lines go through console.debug only when LOG_LEVEL=debug.

let debugEnabled = (process.env.LOG_LEVEL ?? '').toLowerCase() === 'debug';

export function setLogLevel(level: string): void {
  debugEnabled = level.toLowerCase() === 'debug';
}

export function debug(tag: string, ...args: unknown[]): void {
  if (debugEnabled) console.debug(tag, ...args);
}
