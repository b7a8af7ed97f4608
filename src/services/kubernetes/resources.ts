/**
 * Resource Translator
 *
 * Maps resource operations onto the current session's typed or generic
 * capability, with the namespace pre-check, retry and deadline applied to
 * every call. Each operation resolves the current session once, before its
 * first remote call.
 */

import type {
  CallOptions,
  DeleteOptions,
  DeploymentParams,
  KubeDocument,
  KubeDocumentList,
  ListOptions,
  ResolvedResource,
  ResourceDescriptor,
} from '../../domain/types';
import { isRecord, stringField } from '../../domain/types';
import { NotFoundError, ValidationError, isNotFoundError } from '../../errors/index';
import { buildDeployment, toDeploymentDocument } from './deployment-builder';
import { ClusterOperations, type OperationSettings, type Step } from './operations';
import type { ClusterSession } from './registry';

const DEPLOYMENTS: ResolvedResource = {
  group: 'apps',
  version: 'v1',
  resource: 'deployments',
  kind: 'Deployment',
  namespaced: true,
};

export interface ResourceListResult {
  resource: ResolvedResource;
  items: KubeDocument[];
}

function hasSelectors(options: ListOptions): boolean {
  return Boolean(options.labelSelector || options.fieldSelector);
}

function requireName(name: string, kind: string): void {
  if (name.trim() === '') {
    throw new ValidationError(`${kind} name must be specified`, ['name']);
  }
}

export class ResourceTranslator extends ClusterOperations {
  constructor(settings: OperationSettings) {
    super(settings, 'resource-translator');
  }

  // ===== TYPED PATH =====

  async getPod(name: string, namespace = '', call: CallOptions = {}): Promise<KubeDocument> {
    requireName(name, 'pod');
    const session = this.registry.current();
    const ns = this.namespaceOrCurrent(namespace);

    return this.run(
      'get-pod',
      'read',
      call,
      async (step) => {
        await this.ensureNamespace(session, ns, step);
        return this.readPod(session, name, ns, step);
      },
      { pod: name, namespace: ns },
    );
  }

  /**
   * List pods. An empty namespace lists across all namespaces.
   */
  async listPods(options: ListOptions = {}, call: CallOptions = {}): Promise<KubeDocumentList> {
    const session = this.registry.current();
    const ns = options.namespace?.trim() ?? '';

    const list = await this.run(
      'list-pods',
      'read',
      call,
      async (step) => {
        if (ns !== '') {
          await this.ensureNamespace(session, ns, step);
        }
        return step('list pods', (signal) => session.typed.listPods({ ...options, namespace: ns }, { signal }));
      },
      { namespace: ns || '*' },
    );

    if (list.items.length === 0) {
      throw new NotFoundError(
        hasSelectors(options) ? 'no pods found matching the specified selectors' : 'no pods found',
        'pod',
      );
    }
    return list;
  }

  async deletePod(
    name: string,
    namespace = '',
    options: DeleteOptions = {},
    call: CallOptions = {},
  ): Promise<string> {
    requireName(name, 'pod');
    const session = this.registry.current();
    const ns = this.namespaceOrCurrent(namespace);

    await this.run(
      'delete-pod',
      'mutation',
      call,
      async (step) => {
        await this.ensureNamespace(session, ns, step);
        await this.readPod(session, name, ns, step);
        await step('delete pod', (signal) =>
          session.typed.deletePod(name, ns, { gracePeriodSeconds: options.force ? 0 : undefined }, { signal }),
        );
      },
      { pod: name, namespace: ns, force: options.force === true },
    );

    return `Pod "${name}" deleted successfully from namespace "${ns}"`;
  }

  /**
   * List deployments. An empty namespace lists across all namespaces.
   */
  async listDeployments(options: ListOptions = {}, call: CallOptions = {}): Promise<KubeDocumentList> {
    const session = this.registry.current();
    const ns = options.namespace?.trim() ?? '';

    const list = await this.run(
      'list-deployments',
      'read',
      call,
      async (step) => {
        if (ns !== '') {
          await this.ensureNamespace(session, ns, step);
        }
        return step('list deployments', (signal) =>
          session.typed.listDeployments({ ...options, namespace: ns }, { signal }),
        );
      },
      { namespace: ns || '*' },
    );

    if (list.items.length === 0) {
      const scope = ns === '' ? 'in any namespace' : `in namespace "${ns}"`;
      const matching = hasSelectors(options) ? ' matching the specified selectors' : '';
      throw new NotFoundError(`no deployments found${matching} ${scope}`, 'deployment');
    }
    return list;
  }

  // ===== GENERIC PATH =====

  async getResource(descriptor: ResourceDescriptor, call: CallOptions = {}): Promise<KubeDocument> {
    requireName(descriptor.name, 'resource');
    const session = this.registry.current();
    const ns = this.namespaceOrCurrent(descriptor.namespace);

    return this.run(
      'get-resource',
      'read',
      call,
      async (step) => {
        const resource = await this.resolve(session, descriptor, step);
        if (resource.namespaced) {
          await this.ensureNamespace(session, ns, step);
        }
        return this.readResource(session, resource, descriptor, ns, step);
      },
      { resource: descriptor.resourceKind, name: descriptor.name, namespace: ns },
    );
  }

  /**
   * List resources of one kind. An empty namespace lists across all
   * namespaces.
   */
  async listResources(
    descriptor: ResourceDescriptor,
    options: Omit<ListOptions, 'namespace'> = {},
    call: CallOptions = {},
  ): Promise<ResourceListResult> {
    const session = this.registry.current();
    const ns = descriptor.namespace.trim();

    const result = await this.run(
      'list-resources',
      'read',
      call,
      async (step) => {
        const resource = await this.resolve(session, descriptor, step);
        if (resource.namespaced && ns !== '') {
          await this.ensureNamespace(session, ns, step);
        }
        const list = await step(`list ${resource.resource}`, (signal) =>
          session.generic.list(resource, { ...options, namespace: ns }, { signal }),
        );
        return { resource, items: list.items };
      },
      { resource: descriptor.resourceKind, namespace: ns || '*' },
    );

    if (result.items.length === 0) {
      throw new NotFoundError(
        hasSelectors(options)
          ? `no ${descriptor.resourceKind} found matching the specified selectors`
          : `no ${descriptor.resourceKind} found`,
        descriptor.resourceKind,
      );
    }
    return result;
  }

  async deleteResource(
    descriptor: ResourceDescriptor,
    options: DeleteOptions = {},
    call: CallOptions = {},
  ): Promise<string> {
    requireName(descriptor.name, 'resource');
    const session = this.registry.current();
    const ns = this.namespaceOrCurrent(descriptor.namespace);

    const resource = await this.run(
      'delete-resource',
      'mutation',
      call,
      async (step) => {
        const resolved = await this.resolve(session, descriptor, step);
        if (resolved.namespaced) {
          await this.ensureNamespace(session, ns, step);
        }
        await this.readResource(session, resolved, descriptor, ns, step);
        await step(`delete ${resolved.resource}`, (signal) =>
          session.generic.delete(
            resolved,
            descriptor.name,
            ns,
            { gracePeriodSeconds: options.force ? 0 : undefined },
            { signal },
          ),
        );
        return resolved;
      },
      { resource: descriptor.resourceKind, name: descriptor.name, namespace: ns },
    );

    return resource.namespaced
      ? `${resource.kind} "${descriptor.name}" deleted successfully from namespace "${ns}"`
      : `${resource.kind} "${descriptor.name}" deleted successfully`;
  }

  /**
   * Create a resource from a document. The descriptor's namespace wins over
   * the document's; the descriptor's name fills in a document without one.
   */
  async createResource(
    descriptor: ResourceDescriptor,
    document: KubeDocument,
    call: CallOptions = {},
  ): Promise<KubeDocument> {
    const session = this.registry.current();
    const ns = this.namespaceOrCurrent(descriptor.namespace || stringField(document, 'metadata', 'namespace'));
    const named = this.withName(document, descriptor.name);
    requireName(stringField(named, 'metadata', 'name'), 'resource');

    return this.run(
      'create-resource',
      'mutation',
      call,
      async (step) => {
        const resource = await this.resolve(session, descriptor, step);
        return this.create(session, resource, ns, named, step);
      },
      { resource: descriptor.resourceKind, namespace: ns },
    );
  }

  async createDeployment(params: DeploymentParams, call: CallOptions = {}): Promise<string> {
    const spec = buildDeployment({ ...params, namespace: this.namespaceOrCurrent(params.namespace) });
    const session = this.registry.current();

    await this.run(
      'create-deployment',
      'mutation',
      call,
      (step) => this.create(session, DEPLOYMENTS, spec.namespace, toDeploymentDocument(spec), step),
      { deployment: spec.name, namespace: spec.namespace, replicas: spec.replicas },
    );

    return `Deployment "${spec.name}" created successfully in namespace "${spec.namespace}" with ${spec.replicas} replica(s)`;
  }

  // ===== HELPERS =====

  private async readPod(session: ClusterSession, name: string, namespace: string, step: Step): Promise<KubeDocument> {
    try {
      return await step('read pod', (signal) => session.typed.readPod(name, namespace, { signal }));
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new NotFoundError(`pod "${name}" not found in namespace "${namespace}"`, 'pod', name, { namespace });
      }
      throw error;
    }
  }

  private resolve(session: ClusterSession, descriptor: ResourceDescriptor, step: Step): Promise<ResolvedResource> {
    if (descriptor.resourceKind.trim() === '') {
      throw new ValidationError('resource type must be specified', ['resourceKind']);
    }
    return step('discover resource', (signal) => session.generic.resolve(descriptor, { signal }));
  }

  private async readResource(
    session: ClusterSession,
    resource: ResolvedResource,
    descriptor: ResourceDescriptor,
    namespace: string,
    step: Step,
  ): Promise<KubeDocument> {
    try {
      return await step(`get ${resource.resource}`, (signal) =>
        session.generic.get(resource, descriptor.name, namespace, { signal }),
      );
    } catch (error) {
      if (isNotFoundError(error)) {
        const where = resource.namespaced ? ` in namespace "${namespace}"` : '';
        throw new NotFoundError(
          `${descriptor.resourceKind} "${descriptor.name}" not found${where}`,
          resource.resource,
          descriptor.name,
          { namespace },
        );
      }
      throw error;
    }
  }

  private async create(
    session: ClusterSession,
    resource: ResolvedResource,
    namespace: string,
    document: KubeDocument,
    step: Step,
  ): Promise<KubeDocument> {
    if (resource.namespaced) {
      await this.ensureNamespace(session, namespace, step);
    }
    return step(`create ${resource.resource}`, (signal) =>
      session.generic.create(resource, namespace, document, { signal }),
    );
  }

  private withName(document: KubeDocument, name: string): KubeDocument {
    if (name.trim() === '' || stringField(document, 'metadata', 'name') !== '') {
      return document;
    }
    const metadata = document.metadata;
    return { ...document, metadata: isRecord(metadata) ? { ...metadata, name } : { name } };
  }
}
