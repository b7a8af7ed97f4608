/**
 * kube-session-manager
 *
 * Named Kubernetes cluster sessions with namespace-aware resource
 * operations, bounded log reads and a tool layer returning `Result` values.
 *
 * @example
 * ```typescript
 * const config = createConfiguration();
 * const logger = createLogger(config.logging);
 * const manager = createClusterManager({ config, logger });
 * const tools = createToolRegistry(manager);
 * ```
 */

export { createConfiguration, createDefaultConfig, validateConfig, getConfigurationSummary } from './config/index';
export type { ApplicationConfig, RetryConfig, TimeoutConfig } from './config/index';
export { createLogger, createTimer, type Logger } from './lib/logger';
export * from './errors/index';
export * from './domain/types';
export { parseDuration, formatAge, formatDuration, retry, runRemote, withTimeout, sleep } from './shared/index';
export {
  createKubernetesConnector,
  loadKubeconfig,
  parseKubeconfig,
  resolveKubeconfigPath,
} from './infrastructure/kubernetes/index';
export type {
  ClusterConnection,
  ClusterConnector,
  GenericResourceOps,
  LoadedClusterConfig,
  TypedResourceOps,
} from './infrastructure/kubernetes/index';
export {
  createClusterManager,
  ConnectionRegistry,
  LogStreamReader,
  ResourceTranslator,
  type ClusterManager,
  type ClusterManagerOptions,
  type ClusterSession,
} from './services/kubernetes/index';
export { clusterTools, createToolRegistry, defineTool, type ClusterTool } from './tools/index';
