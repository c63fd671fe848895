/**
 * Strict isolation mode: opt-in checks for the trusted shortcuts.
 * With strict mode on, `tryAssumeCurrent` verifies its claim instead of
 * trusting it, and a violation is reported through `onWarn` before it throws.
 */

let strictModeEnabled = false;
let onWarnCallback: ((message: string) => void) | undefined;

/**
 * Options for {@link enableStrictMode}. When `onWarn` is provided, it is called
 * with the message instead of `console.warn`.
 */
export type StrictModeOptions = {
  onWarn?: (message: string) => void;
};

/**
 * Enables strict isolation checks for the process. `tryAssumeCurrent` then
 * verifies the domain is current and throws `IsolationViolation` when it is
 * not. Call once at startup or in tests.
 */
export function enableStrictMode(options?: StrictModeOptions): void {
  strictModeEnabled = true;
  onWarnCallback = options?.onWarn;
}

/** Internal use for tests only; not part of public API. */
export function disableStrictMode(): void {
  strictModeEnabled = false;
  onWarnCallback = undefined;
}

/** @internal */
export function isStrictModeEnabled(): boolean {
  return strictModeEnabled;
}

/**
 * Reports a strict-mode finding through onWarn (or console.warn). No-op when
 * strict mode is off. Callers throw the error themselves.
 * @internal
 */
export function strictModeWarn(message: string): void {
  if (!strictModeEnabled) return;
  if (onWarnCallback) {
    onWarnCallback(message);
  } else {
    console.warn(message);
  }
}
