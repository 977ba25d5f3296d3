// Console logging for pass execution.
// Env flags:
// - VTABLE_INDEXES_DEBUG=1 prints pass timings and per-pass counters

const envFlag = (value: string | undefined): boolean => !!value && value !== "0";

export const isPassDebugEnabled = (): boolean =>
  envFlag(process.env.VTABLE_INDEXES_DEBUG);

export type PassLogger = (topic: string, message: string) => void;

export const consoleLogger: PassLogger = (topic, message) => {
  // eslint-disable-next-line no-console
  console.log(`[vtable-indexes][${topic}] ${message}`);
};

export const silentLogger: PassLogger = () => {};

export const defaultPassLogger = (): PassLogger =>
  isPassDebugEnabled() ? consoleLogger : silentLogger;
