/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the constants shared by the registry, the
 * resource operations and the log reader.
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  read: 20000, // 20 seconds (gets, lists, liveness check)
  mutation: 30000, // 30 seconds (create, delete)
  logs: 30000, // 30 seconds (log streaming)
} as const;

/**
 * Default retry schedule: five attempts spaced 10ms apart
 */
export const DEFAULT_RETRY = {
  maxAttempts: 5,
  delayMs: 10,
  backoff: 1,
  maxDelayMs: 1000,
} as const;

/**
 * Hard upper bound on log bytes returned by a single read
 */
export const LOG_BYTE_CEILING = 100 * 1024;

export const DEFAULT_NAMESPACE = 'default';

export const LOG_TRUNCATION_NOTICE =
  "\n\n[Output truncated due to size limits. Use the 'tail' or 'since' parameters to view specific sections of logs.]";

export const NO_CLUSTERS_MESSAGE = 'no clusters configured - use the load_kubeconfig tool first';
