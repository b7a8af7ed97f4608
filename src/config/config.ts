/**
 * Application configuration with environment overrides
 */

import type { ApplicationConfig, LogLevel, NodeEnv } from './types';
import { DEFAULT_NAMESPACE, DEFAULT_RETRY, DEFAULT_TIMEOUTS, LOG_BYTE_CEILING } from './defaults';

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Create default configuration with sensible defaults
 */
function createDefaultConfig(): ApplicationConfig {
  return {
    nodeEnv: 'production',
    logging: {
      level: 'info',
      pretty: false,
    },
    kubernetes: {
      namespace: DEFAULT_NAMESPACE,
      kubeconfig: '',
      timeouts: { ...DEFAULT_TIMEOUTS },
      retry: { ...DEFAULT_RETRY },
      logByteCeiling: LOG_BYTE_CEILING,
    },
  };
}

/**
 * Parse integer with fallback
 */
function parseIntWithFallback(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function parseNodeEnv(value: string | undefined, fallback: NodeEnv): NodeEnv {
  return NODE_ENVS.find((env) => env === value) ?? fallback;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

/**
 * Create configuration with environment overrides
 */
function createConfiguration(env: NodeJS.ProcessEnv = process.env): ApplicationConfig {
  const defaultConfig = createDefaultConfig();
  const nodeEnv = parseNodeEnv(env.NODE_ENV, defaultConfig.nodeEnv);
  const { timeouts, retry } = defaultConfig.kubernetes;

  return {
    nodeEnv,
    logging: {
      level: parseLogLevel(env.LOG_LEVEL, nodeEnv === 'development' ? 'debug' : 'info'),
      pretty: nodeEnv === 'development' && env.LOG_FORMAT !== 'json',
    },
    kubernetes: {
      ...defaultConfig.kubernetes,
      namespace: env.KUBE_NAMESPACE || env.K8S_NAMESPACE || defaultConfig.kubernetes.namespace,
      kubeconfig: env.KUBECONFIG ?? defaultConfig.kubernetes.kubeconfig,
      timeouts: {
        read: parseIntWithFallback(env.K8S_READ_TIMEOUT, timeouts.read),
        mutation: parseIntWithFallback(env.K8S_MUTATION_TIMEOUT, timeouts.mutation),
        logs: parseIntWithFallback(env.K8S_LOGS_TIMEOUT, timeouts.logs),
      },
      retry: {
        ...retry,
        maxAttempts: parseIntWithFallback(env.K8S_RETRY_ATTEMPTS, retry.maxAttempts),
        delayMs: parseIntWithFallback(env.K8S_RETRY_DELAY, retry.delayMs),
      },
    },
  };
}

/**
 * Get configuration summary with key values
 */
function getConfigurationSummary(config: ApplicationConfig): {
  nodeEnv: string;
  logLevel: string;
  namespace: string;
  retryAttempts: number;
} {
  return {
    nodeEnv: config.nodeEnv,
    logLevel: config.logging.level,
    namespace: config.kubernetes.namespace,
    retryAttempts: config.kubernetes.retry.maxAttempts,
  };
}

export { createDefaultConfig, createConfiguration, getConfigurationSummary };
