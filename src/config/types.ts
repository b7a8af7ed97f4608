/**
 * Configuration Types
 */

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoff: number;
  maxDelayMs: number;
}

export interface TimeoutConfig {
  read: number;
  mutation: number;
  logs: number;
}

export interface ApplicationConfig {
  nodeEnv: NodeEnv;
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  kubernetes: {
    namespace: string;
    kubeconfig: string;
    timeouts: TimeoutConfig;
    retry: RetryConfig;
    logByteCeiling: number;
  };
}
