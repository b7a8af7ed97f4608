/**
 * Central utilities module
 */

export { abortable, retry, runRemote, sleep, withTimeout } from './async';
export type { RemoteCallOptions, RetryOptions, RetryPolicy } from './async';
export { formatAge, formatDuration, parseDuration } from './duration';
