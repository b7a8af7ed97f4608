/**
 * Capability interfaces between the core and a cluster API client.
 *
 * The registry and translator only ever see these shapes; the real
 * implementation lives in ./client and tests supply in-process fakes.
 */

import type { Readable } from 'node:stream';
import type {
  CallOptions,
  KubeDocument,
  KubeDocumentList,
  ListOptions,
  ResolvedResource,
  ResourceDescriptor,
} from '../../domain/types';

export interface PodLogOptions {
  podName: string;
  namespace: string;
  container: string;
  previous: boolean;
  tailLines?: number;
  sinceSeconds?: number;
  /** Server-side cap on the number of bytes returned */
  limitBytes?: number;
}

export interface RemoteDeleteOptions {
  gracePeriodSeconds?: number;
}

/**
 * Typed operations for the resource kinds the core handles directly.
 */
export interface TypedResourceOps {
  readNamespace(name: string, call?: CallOptions): Promise<KubeDocument>;
  listNamespaces(options: { limit?: number }, call?: CallOptions): Promise<KubeDocumentList>;
  readPod(name: string, namespace: string, call?: CallOptions): Promise<KubeDocument>;
  /** Empty namespace lists across all namespaces */
  listPods(options: ListOptions, call?: CallOptions): Promise<KubeDocumentList>;
  deletePod(name: string, namespace: string, options: RemoteDeleteOptions, call?: CallOptions): Promise<void>;
  openPodLogStream(options: PodLogOptions, call?: CallOptions): Promise<Readable>;
  /** Empty namespace lists across all namespaces */
  listDeployments(options: ListOptions, call?: CallOptions): Promise<KubeDocumentList>;
}

/**
 * Untyped operations addressed by group/version/resource.
 */
export interface GenericResourceOps {
  resolve(
    descriptor: Pick<ResourceDescriptor, 'group' | 'version' | 'resourceKind'>,
    call?: CallOptions,
  ): Promise<ResolvedResource>;
  get(resource: ResolvedResource, name: string, namespace: string, call?: CallOptions): Promise<KubeDocument>;
  list(resource: ResolvedResource, options: ListOptions, call?: CallOptions): Promise<KubeDocumentList>;
  create(
    resource: ResolvedResource,
    namespace: string,
    document: KubeDocument,
    call?: CallOptions,
  ): Promise<KubeDocument>;
  delete(
    resource: ResolvedResource,
    name: string,
    namespace: string,
    options: RemoteDeleteOptions,
    call?: CallOptions,
  ): Promise<void>;
}

/**
 * A parsed connection descriptor, ready to hand to a connector.
 */
export interface LoadedClusterConfig {
  path: string;
  content: string;
  currentContext: string;
  contexts: string[];
  cluster?: string;
  user?: string;
  namespace?: string;
  server?: string;
}

export interface ClusterConnection {
  typed: TypedResourceOps;
  generic: GenericResourceOps;
  server?: string;
}

export interface ClusterConnector {
  connect(config: LoadedClusterConfig): ClusterConnection;
}
