/**
 * Kubernetes Service - cluster sessions and resource operations
 *
 * Wires the connection registry, the resource translator and the log
 * reader from application configuration.
 */

import type { Logger } from 'pino';
import type { ApplicationConfig } from '../../config/types';
import { createKubernetesConnector } from '../../infrastructure/kubernetes/client';
import type { ClusterConnector, LoadedClusterConfig } from '../../infrastructure/kubernetes/types';
import { LogStreamReader } from './logs';
import { ConnectionRegistry } from './registry';
import { ResourceTranslator } from './resources';

export interface ClusterManagerOptions {
  config: ApplicationConfig;
  logger: Logger;
  /** Defaults to the @kubernetes/client-node connector */
  connector?: ClusterConnector;
  loadConfig?: (path: string, fallback: string) => Promise<LoadedClusterConfig>;
}

export interface ClusterManager {
  readonly registry: ConnectionRegistry;
  readonly resources: ResourceTranslator;
  readonly logs: LogStreamReader;
}

export function createClusterManager(options: ClusterManagerOptions): ClusterManager {
  const { config } = options;
  const logger = options.logger.child({ service: 'kubernetes' });
  const { timeouts, retry } = config.kubernetes;

  const registry = new ConnectionRegistry({
    connector: options.connector ?? createKubernetesConnector(logger),
    logger,
    timeouts,
    retry,
    defaultNamespace: config.kubernetes.namespace,
    kubeconfigFallback: config.kubernetes.kubeconfig,
    loadConfig: options.loadConfig,
  });

  const settings = { registry, timeouts, retry, logger };
  return {
    registry,
    resources: new ResourceTranslator(settings),
    logs: new LogStreamReader({ ...settings, byteCeiling: config.kubernetes.logByteCeiling }),
  };
}

export { ConnectionRegistry, type ClusterSession, type ConnectionRegistryOptions } from './registry';
export { ResourceTranslator, type ResourceListResult } from './resources';
export { LogStreamReader, formatLogHeader, readBounded, type BoundedRead } from './logs';
export { ClusterOperations, type OperationSettings, type Step } from './operations';
export {
  buildDeployment,
  parseContainerPort,
  toDeploymentDocument,
  type ContainerPortSpec,
  type DeploymentSpecification,
} from './deployment-builder';
export * from './formatter';
