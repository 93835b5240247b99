// src/runner/startup/signals.ts

/** Signals the launcher relays to the server process. */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
  'SIGINT',
  'SIGTERM',
  'SIGHUP',
  'SIGQUIT',
];

/** Anything signal listeners can be installed on (process, or an emitter). */
export type SignalTarget = {
  on: (event: NodeJS.Signals, listener: NodeJS.SignalsListener) => unknown;
  off: (event: NodeJS.Signals, listener: NodeJS.SignalsListener) => unknown;
};

/**
 * Install one handler for each signal. Returns a detach function; detaching
 * twice is harmless.
 */
export const attachSignalForwarding = (
  onSignal: (signal: NodeJS.Signals) => void,
  signals: readonly NodeJS.Signals[] = FORWARDED_SIGNALS,
  target: SignalTarget = process,
): (() => void) => {
  const listener: NodeJS.SignalsListener = (signal) => onSignal(signal);
  for (const s of signals) target.on(s, listener);
  let attached = true;
  return () => {
    if (!attached) return;
    attached = false;
    for (const s of signals) target.off(s, listener);
  };
};
