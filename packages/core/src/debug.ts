// lipika/debug - Debug logging switch

export let DEBUG = false;

export function setDebug(value: boolean) {
  DEBUG = value;
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}
