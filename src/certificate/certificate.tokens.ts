export const CERTIFICATE_CONFIG = Symbol('CERTIFICATE_CONFIG');
export const WATCHER_CONFIG = Symbol('WATCHER_CONFIG');
export const INTEGRITY_CONFIG = Symbol('INTEGRITY_CONFIG');
export const PUBSUB = Symbol('PUBSUB');
export const CLOCK = Symbol('CLOCK');

/**
 * Source of the current time. Overridden in tests.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
