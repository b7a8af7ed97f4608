/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Implements the capability interfaces on top of @kubernetes/client-node.
 * Responses are converted to plain documents and HTTP failures to the
 * application error kinds; retries and deadlines are applied by callers.
 */

import * as k8s from '@kubernetes/client-node';
import { Readable } from 'node:stream';
import type { Logger } from 'pino';
import {
  ConnectionError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../../errors/index';
import {
  field,
  isRecord,
  type CallOptions,
  stringField,
  type KubeDocument,
  type KubeDocumentList,
  type ListOptions,
  type ResolvedResource,
  type ResourceDescriptor,
} from '../../domain/types';
import type {
  ClusterConnection,
  ClusterConnector,
  GenericResourceOps,
  LoadedClusterConfig,
  PodLogOptions,
  RemoteDeleteOptions,
  TypedResourceOps,
} from './types';

/**
 * Convert a client model (class instances, Date fields) into a plain document
 */
function toDocument(value: unknown): KubeDocument {
  const plain: unknown = JSON.parse(JSON.stringify(value ?? {}));
  if (!isRecord(plain)) {
    throw new Error('unexpected response from cluster API');
  }
  return plain;
}

function toDocumentList(items: unknown[], continueToken?: string): KubeDocumentList {
  return {
    items: items.map(toDocument),
    ...(continueToken ? { continueToken } : {}),
  };
}

/**
 * Map an API failure to an application error
 */
export function mapApiError(error: unknown, operation: string): Error {
  if (error instanceof k8s.HttpError) {
    const status = error.statusCode ?? error.response?.statusCode;
    const body: unknown = error.body;
    const detail = stringField(body, 'message') || error.message || `HTTP ${status ?? 'error'}`;
    switch (status) {
      case 404:
        return new NotFoundError(detail, undefined, undefined, { operation, status });
      case 401:
      case 403:
        return new ConnectionError(detail, undefined, error, { operation, status });
      case 409:
      case 422:
        return new ValidationError(detail, undefined, { operation, status });
      default:
        return new Error(`${operation}: ${detail}`);
    }
  }
  return error instanceof Error ? error : new Error(errorMessage(error));
}

async function invoke<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw mapApiError(error, operation);
  }
}

interface InterceptableApi {
  addInterceptor(interceptor: (options: object) => void): void;
}

/**
 * Tie the next requests of `api` to the caller's signal. The HTTP layer
 * copies unrecognised request options through to `http.request`, which
 * destroys the socket when the signal aborts.
 */
function bindSignal<T extends InterceptableApi>(api: T, call?: CallOptions): T {
  const signal = call?.signal;
  if (signal) {
    api.addInterceptor((options) => {
      signal.throwIfAborted();
      Object.assign(options, { signal });
    });
  }
  return api;
}

function apiVersionOf(resource: ResolvedResource): string {
  return resource.group ? `${resource.group}/${resource.version}` : resource.version;
}

function stringMap(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') out[key] = entry;
  }
  return out;
}

function toKubernetesObject(
  resource: ResolvedResource,
  namespace: string,
  document: KubeDocument,
): k8s.KubernetesObject {
  const metadata = new k8s.V1ObjectMeta();
  metadata.name = stringField(document, 'metadata', 'name') || undefined;
  metadata.generateName = stringField(document, 'metadata', 'generateName') || undefined;
  metadata.labels = stringMap(field(document, 'metadata', 'labels'));
  metadata.annotations = stringMap(field(document, 'metadata', 'annotations'));
  if (resource.namespaced) {
    metadata.namespace = namespace;
  }
  return Object.assign({}, document, {
    apiVersion: apiVersionOf(resource),
    kind: resource.kind,
    metadata,
  });
}

function createTypedOps(kc: k8s.KubeConfig, logger: Logger): TypedResourceOps {
  const core = (call?: CallOptions) => bindSignal(kc.makeApiClient(k8s.CoreV1Api), call);
  const apps = (call?: CallOptions) => bindSignal(kc.makeApiClient(k8s.AppsV1Api), call);

  return {
    async readNamespace(name, call) {
      const { body } = await invoke('read namespace', () => core(call).readNamespace(name));
      return toDocument(body);
    },

    async listNamespaces({ limit }, call) {
      const { body } = await invoke('list namespaces', () =>
        core(call).listNamespace(undefined, undefined, undefined, undefined, undefined, limit),
      );
      return toDocumentList(body.items, body.metadata?._continue);
    },

    async readPod(name, namespace, call) {
      const { body } = await invoke('read pod', () => core(call).readNamespacedPod(name, namespace));
      return toDocument(body);
    },

    async listPods({ namespace, limit, labelSelector, fieldSelector }: ListOptions, call) {
      const api = core(call);
      const { body } = await invoke('list pods', () =>
        namespace
          ? api.listNamespacedPod(
              namespace,
              undefined,
              undefined,
              undefined,
              fieldSelector || undefined,
              labelSelector || undefined,
              limit,
            )
          : api.listPodForAllNamespaces(
              undefined,
              undefined,
              fieldSelector || undefined,
              labelSelector || undefined,
              limit,
            ),
      );
      return toDocumentList(body.items, body.metadata?._continue);
    },

    async deletePod(name, namespace, { gracePeriodSeconds }: RemoteDeleteOptions, call) {
      await invoke('delete pod', () =>
        core(call).deleteNamespacedPod(name, namespace, undefined, undefined, gracePeriodSeconds),
      );
    },

    async openPodLogStream(options: PodLogOptions, call) {
      logger.debug(
        { pod: options.podName, namespace: options.namespace, container: options.container },
        'Opening pod log stream',
      );
      const { body } = await invoke('read pod logs', () =>
        core(call).readNamespacedPodLog(
          options.podName,
          options.namespace,
          options.container,
          false,
          undefined,
          options.limitBytes,
          undefined,
          options.previous,
          options.sinceSeconds,
          options.tailLines,
        ),
      );
      return Readable.from([Buffer.from(body, 'utf8')]);
    },

    async listDeployments({ namespace, limit, labelSelector, fieldSelector }: ListOptions, call) {
      const api = apps(call);
      const { body } = await invoke('list deployments', () =>
        namespace
          ? api.listNamespacedDeployment(
              namespace,
              undefined,
              undefined,
              undefined,
              fieldSelector || undefined,
              labelSelector || undefined,
              limit,
            )
          : api.listDeploymentForAllNamespaces(
              undefined,
              undefined,
              fieldSelector || undefined,
              labelSelector || undefined,
              limit,
            ),
      );
      return toDocumentList(body.items, body.metadata?._continue);
    },
  };
}

interface GroupVersion {
  group: string;
  version: string;
}

function matchesResource(resource: k8s.V1APIResource, wanted: string): boolean {
  if (resource.name.includes('/')) return false;
  return (
    resource.name === wanted ||
    resource.singularName === wanted ||
    resource.kind.toLowerCase() === wanted ||
    (resource.shortNames ?? []).includes(wanted)
  );
}

function createGenericOps(kc: k8s.KubeConfig, logger: Logger): GenericResourceOps {
  const objects = (call?: CallOptions) => bindSignal(k8s.KubernetesObjectApi.makeApiClient(kc), call);

  async function servedGroups(call?: CallOptions): Promise<GroupVersion[]> {
    const { body } = await invoke('discover API groups', () =>
      bindSignal(kc.makeApiClient(k8s.ApisApi), call).getAPIVersions(),
    );
    return body.groups.flatMap((group) => {
      const version = group.preferredVersion?.version ?? group.versions[0]?.version;
      return version ? [{ group: group.name, version }] : [];
    });
  }

  /**
   * `/api/<version>` and `/apis/<group>/<version>` both serve an
   * APIResourceList, so every group goes through the core discovery call
   * with its path swapped.
   */
  async function resourcesOf({ group, version }: GroupVersion, call?: CallOptions): Promise<k8s.V1APIResource[]> {
    const api = bindSignal(kc.makeApiClient(k8s.CoreV1Api), call);
    const uri = group ? `${api.basePath}/apis/${group}/${version}/` : `${api.basePath}/api/${version}/`;
    api.addInterceptor((options) => {
      Object.assign(options, { uri });
    });
    const { body } = await invoke(`discover resources in ${group || 'core'}/${version}`, () =>
      api.getAPIResources(),
    );
    return body.resources;
  }

  /**
   * Group versions to search, in order. With neither group nor version the
   * core group comes first and the served groups are only listed when it
   * has no match.
   */
  async function* candidates(
    descriptor: Pick<ResourceDescriptor, 'group' | 'version'>,
    call?: CallOptions,
  ): AsyncGenerator<GroupVersion> {
    const { group, version } = descriptor;
    if (group === '' && version === '') {
      yield { group: '', version: 'v1' };
      yield* await servedGroups(call);
      return;
    }
    if (version !== '') {
      yield { group, version };
      return;
    }
    const served = (await servedGroups(call)).find((entry) => entry.group === group);
    if (!served) {
      throw new NotFoundError(`API group "${group}" not found`, 'apigroup', group);
    }
    yield served;
  }

  return {
    async resolve(descriptor, call) {
      const wanted = descriptor.resourceKind.toLowerCase();
      const searchAll = descriptor.group === '' && descriptor.version === '';
      let skipped: Error | undefined;

      for await (const groupVersion of candidates(descriptor, call)) {
        let resources: k8s.V1APIResource[];
        try {
          resources = await resourcesOf(groupVersion, call);
        } catch (error) {
          if (!searchAll || groupVersion.group === '' || call?.signal?.aborted) {
            throw error;
          }
          // Aggregated groups can be temporarily unavailable; keep searching.
          logger.debug({ ...groupVersion, error: errorMessage(error) }, 'Skipping API group');
          skipped = error instanceof Error ? error : new Error(errorMessage(error));
          continue;
        }
        const match = resources.find((resource) => matchesResource(resource, wanted));
        if (match) {
          return {
            group: groupVersion.group,
            version: groupVersion.version,
            resource: match.name,
            kind: match.kind,
            namespaced: match.namespaced,
          };
        }
      }

      if (skipped) {
        throw skipped;
      }
      throw new NotFoundError(
        `resource type "${descriptor.resourceKind}" not found`,
        'resourcetype',
        descriptor.resourceKind,
      );
    },

    async get(resource, name, namespace, call) {
      const { body } = await invoke(`get ${resource.resource}`, () =>
        objects(call).read({
          apiVersion: apiVersionOf(resource),
          kind: resource.kind,
          metadata: { name, namespace: resource.namespaced ? namespace : '' },
        }),
      );
      return toDocument(body);
    },

    async list(resource, { namespace, limit, labelSelector, fieldSelector }, call) {
      const { body } = await invoke(`list ${resource.resource}`, () =>
        objects(call).list(
          apiVersionOf(resource),
          resource.kind,
          resource.namespaced && namespace ? namespace : undefined,
          undefined,
          undefined,
          undefined,
          fieldSelector || undefined,
          labelSelector || undefined,
          limit,
        ),
      );
      return toDocumentList(body.items, body.metadata?._continue);
    },

    async create(resource, namespace, document, call) {
      const { body } = await invoke(`create ${resource.resource}`, () =>
        objects(call).create(toKubernetesObject(resource, namespace, document)),
      );
      return toDocument(body);
    },

    async delete(resource, name, namespace, { gracePeriodSeconds }, call) {
      await invoke(`delete ${resource.resource}`, () =>
        objects(call).delete(
          {
            apiVersion: apiVersionOf(resource),
            kind: resource.kind,
            metadata: { name, namespace: resource.namespaced ? namespace : '' },
          },
          undefined,
          undefined,
          gracePeriodSeconds,
        ),
      );
    },
  };
}

/**
 * Create a connector that builds API handles from a loaded kubeconfig
 */
export const createKubernetesConnector = (logger: Logger): ClusterConnector => ({
  connect(config: LoadedClusterConfig): ClusterConnection {
    const kc = new k8s.KubeConfig();
    kc.loadFromString(config.content);
    kc.setCurrentContext(config.currentContext);

    const server = kc.getCurrentCluster()?.server ?? config.server;
    const connectionLogger = logger.child({ context: config.currentContext, server });

    return {
      typed: createTypedOps(kc, connectionLogger),
      generic: createGenericOps(kc, connectionLogger),
      server,
    };
  },
});
