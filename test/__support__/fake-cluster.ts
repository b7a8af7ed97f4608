/**
 * In-process stand-in for a cluster API, implementing the typed and generic
 * capability interfaces over plain in-memory documents.
 */

import { Readable } from 'node:stream';
import {
  field,
  isRecord,
  stringField,
  type CallOptions,
  type KubeDocument,
  type KubeDocumentList,
  type ListOptions,
  type ResolvedResource,
  type ResourceDescriptor,
} from '../../src/domain/types';
import { CancelledError, NotFoundError, ValidationError } from '../../src/errors/index';
import type {
  ClusterConnection,
  ClusterConnector,
  GenericResourceOps,
  LoadedClusterConfig,
  PodLogOptions,
  RemoteDeleteOptions,
  TypedResourceOps,
} from '../../src/infrastructure/kubernetes/types';

export interface CatalogEntry extends ResolvedResource {
  shortNames?: string[];
}

export const DEFAULT_CATALOG: readonly CatalogEntry[] = [
  { group: '', version: 'v1', resource: 'pods', kind: 'Pod', namespaced: true, shortNames: ['po'] },
  { group: '', version: 'v1', resource: 'configmaps', kind: 'ConfigMap', namespaced: true, shortNames: ['cm'] },
  { group: '', version: 'v1', resource: 'namespaces', kind: 'Namespace', namespaced: false, shortNames: ['ns'] },
  { group: 'apps', version: 'v1', resource: 'deployments', kind: 'Deployment', namespaced: true, shortNames: ['deploy'] },
  {
    group: 'rbac.authorization.k8s.io',
    version: 'v1',
    resource: 'clusterroles',
    kind: 'ClusterRole',
    namespaced: false,
  },
];

export const LOG_CHUNK_SIZE = 16 * 1024;

export interface PodFixture {
  name: string;
  namespace?: string;
  phase?: string;
  containers?: string[];
  ready?: boolean;
  restartCount?: number;
  nodeName?: string;
  podIP?: string;
  creationTimestamp?: string;
  labels?: Record<string, string>;
}

export function podDocument(fixture: PodFixture): KubeDocument {
  const containers = fixture.containers ?? ['app'];
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      name: fixture.name,
      namespace: fixture.namespace ?? 'default',
      creationTimestamp: fixture.creationTimestamp ?? '2024-01-01T00:00:00Z',
      ...(fixture.labels ? { labels: fixture.labels } : {}),
    },
    spec: {
      ...(fixture.nodeName ? { nodeName: fixture.nodeName } : {}),
      containers: containers.map((name) => ({ name, image: `registry.local/${name}:1.0` })),
    },
    status: {
      phase: fixture.phase ?? 'Running',
      podIP: fixture.podIP ?? '10.0.0.1',
      containerStatuses: containers.map((name) => ({
        name,
        ready: fixture.ready ?? true,
        restartCount: fixture.restartCount ?? 0,
        state: { running: { startedAt: '2024-01-01T00:00:05Z' } },
      })),
    },
  };
}

function matchesSelector(document: KubeDocument, selector: string | undefined, root: string[]): boolean {
  if (!selector) return true;
  return selector.split(',').every((term) => {
    const [key = '', value = ''] = term.split('=');
    return stringField(document, ...root, ...key.trim().split('.')) === value.trim();
  });
}

function logKey(namespace: string, pod: string, container: string, previous: boolean): string {
  return `${namespace}/${pod}/${container}${previous ? '#previous' : ''}`;
}

interface PlannedFailure {
  method: string;
  error: Error;
  remaining: number;
}

/**
 * One fake cluster. Documents live per plural resource name; the typed pod
 * and deployment operations read the same collections as the generic path.
 */
export class FakeCluster implements TypedResourceOps, GenericResourceOps {
  readonly namespaces = new Set<string>(['default', 'kube-system']);
  readonly objects = new Map<string, KubeDocument[]>();
  readonly logs = new Map<string, string>();
  readonly calls: string[] = [];
  readonly catalog: CatalogEntry[] = [...DEFAULT_CATALOG];
  readonly deleted: Array<{ name: string; namespace: string; gracePeriodSeconds?: number }> = [];
  lastLogOptions?: PodLogOptions;
  /** Delay applied to every call, in milliseconds */
  latency = 0;
  private readonly failures: PlannedFailure[] = [];

  constructor(readonly id = 'fake') {}

  addPod(fixture: PodFixture): KubeDocument {
    const pod = podDocument(fixture);
    this.collection('pods').push(pod);
    return pod;
  }

  setLogs(namespace: string, pod: string, container: string, text: string, previous = false): void {
    this.logs.set(logKey(namespace, pod, container, previous), text);
  }

  /** Make the next `times` calls of `method` throw `error` */
  fail(method: string, error: Error, times = 1): void {
    this.failures.push({ method, error, remaining: times });
  }

  count(method: string): number {
    return this.calls.filter((entry) => entry === method).length;
  }

  collection(resource: string): KubeDocument[] {
    let items = this.objects.get(resource);
    if (!items) {
      items = [];
      this.objects.set(resource, items);
    }
    return items;
  }

  private async enter(method: string, call: CallOptions = {}): Promise<void> {
    this.calls.push(method);
    if (this.latency > 0) {
      await new Promise<void>((resolve, reject) => {
        const signal = call.signal;
        const timer = setTimeout(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        }, this.latency);
        const onAbort = (): void => {
          clearTimeout(timer);
          reject(new CancelledError(`${method} aborted`));
        };
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    }
    const planned = this.failures.find((entry) => entry.method === method && entry.remaining > 0);
    if (planned) {
      planned.remaining -= 1;
      throw planned.error;
    }
  }

  private filter(resource: string, options: ListOptions, namespaced: boolean): KubeDocumentList {
    const items = this.collection(resource).filter(
      (item) =>
        (!namespaced || !options.namespace || stringField(item, 'metadata', 'namespace') === options.namespace) &&
        matchesSelector(item, options.labelSelector, ['metadata', 'labels']) &&
        matchesSelector(item, options.fieldSelector, []),
    );
    return { items: options.limit && options.limit > 0 ? items.slice(0, options.limit) : items };
  }

  private find(resource: string, name: string, namespace: string, namespaced: boolean): KubeDocument | undefined {
    return this.collection(resource).find(
      (item) =>
        stringField(item, 'metadata', 'name') === name &&
        (!namespaced || stringField(item, 'metadata', 'namespace') === namespace),
    );
  }

  private remove(resource: string, document: KubeDocument): void {
    const items = this.collection(resource);
    items.splice(items.indexOf(document), 1);
  }

  // ===== TYPED =====

  async readNamespace(name: string, call?: CallOptions): Promise<KubeDocument> {
    await this.enter('readNamespace', call);
    if (!this.namespaces.has(name)) {
      throw new NotFoundError(`namespaces "${name}" not found`);
    }
    return { apiVersion: 'v1', kind: 'Namespace', metadata: { name } };
  }

  async listNamespaces(options: { limit?: number }, call?: CallOptions): Promise<KubeDocumentList> {
    await this.enter('listNamespaces', call);
    const names = [...this.namespaces];
    const limited = options.limit ? names.slice(0, options.limit) : names;
    return { items: limited.map((name) => ({ metadata: { name } })) };
  }

  async readPod(name: string, namespace: string, call?: CallOptions): Promise<KubeDocument> {
    await this.enter('readPod', call);
    const pod = this.find('pods', name, namespace, true);
    if (!pod) {
      throw new NotFoundError(`pods "${name}" not found`);
    }
    return pod;
  }

  async listPods(options: ListOptions, call?: CallOptions): Promise<KubeDocumentList> {
    await this.enter('listPods', call);
    return this.filter('pods', options, true);
  }

  async deletePod(name: string, namespace: string, options: RemoteDeleteOptions, call?: CallOptions): Promise<void> {
    await this.enter('deletePod', call);
    const pod = this.find('pods', name, namespace, true);
    if (!pod) {
      throw new NotFoundError(`pods "${name}" not found`);
    }
    this.remove('pods', pod);
    this.deleted.push({ name, namespace, gracePeriodSeconds: options.gracePeriodSeconds });
  }

  async openPodLogStream(options: PodLogOptions, call?: CallOptions): Promise<Readable> {
    await this.enter('openPodLogStream', call);
    this.lastLogOptions = options;
    const text = this.logs.get(logKey(options.namespace, options.podName, options.container, options.previous)) ?? '';
    const bytes = Buffer.from(text, 'utf8');
    const chunks: Buffer[] = [];
    for (let offset = 0; offset < bytes.length; offset += LOG_CHUNK_SIZE) {
      chunks.push(bytes.subarray(offset, offset + LOG_CHUNK_SIZE));
    }
    return Readable.from(chunks);
  }

  async listDeployments(options: ListOptions, call?: CallOptions): Promise<KubeDocumentList> {
    await this.enter('listDeployments', call);
    return this.filter('deployments', options, true);
  }

  // ===== GENERIC =====

  async resolve(
    descriptor: Pick<ResourceDescriptor, 'group' | 'version' | 'resourceKind'>,
    call?: CallOptions,
  ): Promise<ResolvedResource> {
    await this.enter('resolve', call);
    const wanted = descriptor.resourceKind.toLowerCase();
    const entry = this.catalog.find(
      (candidate) =>
        (descriptor.group === '' && descriptor.version === '' ? true : candidate.group === descriptor.group) &&
        (descriptor.version === '' || candidate.version === descriptor.version) &&
        (candidate.resource === wanted ||
          candidate.kind.toLowerCase() === wanted ||
          (candidate.shortNames ?? []).includes(wanted)),
    );
    if (!entry) {
      throw new NotFoundError(`resource type "${descriptor.resourceKind}" not found`);
    }
    return {
      group: entry.group,
      version: entry.version,
      resource: entry.resource,
      kind: entry.kind,
      namespaced: entry.namespaced,
    };
  }

  async get(resource: ResolvedResource, name: string, namespace: string, call?: CallOptions): Promise<KubeDocument> {
    await this.enter('get', call);
    const document = this.find(resource.resource, name, namespace, resource.namespaced);
    if (!document) {
      throw new NotFoundError(`${resource.resource} "${name}" not found`);
    }
    return document;
  }

  async list(resource: ResolvedResource, options: ListOptions, call?: CallOptions): Promise<KubeDocumentList> {
    await this.enter('list', call);
    return this.filter(resource.resource, options, resource.namespaced);
  }

  async create(
    resource: ResolvedResource,
    namespace: string,
    document: KubeDocument,
    call?: CallOptions,
  ): Promise<KubeDocument> {
    await this.enter('create', call);
    const name = stringField(document, 'metadata', 'name');
    if (this.find(resource.resource, name, namespace, resource.namespaced)) {
      throw new ValidationError(`${resource.resource} "${name}" already exists`);
    }
    const metadata = field(document, 'metadata');
    const stored: KubeDocument = {
      ...document,
      apiVersion: resource.group ? `${resource.group}/${resource.version}` : resource.version,
      kind: resource.kind,
      metadata: {
        ...(isRecord(metadata) ? metadata : {}),
        ...(resource.namespaced ? { namespace } : {}),
        creationTimestamp: '2024-01-01T00:00:00Z',
      },
    };
    this.collection(resource.resource).push(stored);
    return stored;
  }

  async delete(
    resource: ResolvedResource,
    name: string,
    namespace: string,
    options: RemoteDeleteOptions,
    call?: CallOptions,
  ): Promise<void> {
    await this.enter('delete', call);
    const document = this.find(resource.resource, name, namespace, resource.namespaced);
    if (!document) {
      throw new NotFoundError(`${resource.resource} "${name}" not found`);
    }
    this.remove(resource.resource, document);
    this.deleted.push({ name, namespace, gracePeriodSeconds: options.gracePeriodSeconds });
  }
}

/**
 * Hands out fake clusters keyed by kubeconfig path; unknown paths share
 * `fallback`.
 */
export class FakeConnector implements ClusterConnector {
  readonly clusters = new Map<string, FakeCluster>();
  readonly connected: LoadedClusterConfig[] = [];

  constructor(readonly fallback = new FakeCluster()) {}

  connect(config: LoadedClusterConfig): ClusterConnection {
    this.connected.push(config);
    const cluster = this.clusters.get(config.path) ?? this.fallback;
    return { typed: cluster, generic: cluster, server: config.server };
  }
}
