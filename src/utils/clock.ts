/**
 * Clock
 *
 * Time source in whole seconds since the epoch. Injected wherever token
 * timing is computed so tests can pin the current time.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
