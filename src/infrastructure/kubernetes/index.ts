/**
 * Kubernetes infrastructure - External K8s client interface
 */

export { createKubernetesConnector, mapApiError } from './client';
export { loadKubeconfig, parseKubeconfig, resolveKubeconfigPath, type Kubeconfig } from './config-loader';
export type {
  ClusterConnection,
  ClusterConnector,
  GenericResourceOps,
  LoadedClusterConfig,
  PodLogOptions,
  RemoteDeleteOptions,
  TypedResourceOps,
} from './types';
