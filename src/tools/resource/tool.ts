/**
 * Resource Tools
 *
 * Generic get, list, create and delete for any served resource type,
 * addressed by group, version and resource name.
 */

import * as yaml from 'js-yaml';
import { isRecord, stringField, type KubeDocument, type ResourceDescriptor } from '../../domain/types';
import { ValidationError } from '../../errors/index';
import type { ClusterManager } from '../../services/kubernetes/index';
import { formatResource, formatResourceList } from '../../services/kubernetes/formatter';
import { defineTool, type ClusterTool } from '../types';
import {
  createResourceSchema,
  deleteResourceSchema,
  getResourceSchema,
  listResourcesSchema,
  type CreateResourceParams,
  type DeleteResourceParams,
  type GetResourceParams,
  type ListResourcesParams,
} from './schema';

export async function getResource(params: GetResourceParams, manager: ClusterManager): Promise<string> {
  const document = await manager.resources.getResource({
    group: params.group,
    version: params.version,
    resourceKind: params.resourceType,
    namespace: params.namespace ?? '',
    name: params.name,
  });
  return formatResource(document);
}

export async function listResources(params: ListResourcesParams, manager: ClusterManager): Promise<string> {
  const namespace = params.allNamespaces
    ? ''
    : params.namespace?.trim() || manager.registry.getCurrentNamespace();

  const { resource, items } = await manager.resources.listResources(
    {
      group: params.group,
      version: params.version,
      resourceKind: params.resourceType,
      namespace,
      name: '',
    },
    { limit: params.limit, labelSelector: params.labelSelector, fieldSelector: params.fieldSelector },
  );
  return formatResourceList(resource.resource, items);
}

export function deleteResource(params: DeleteResourceParams, manager: ClusterManager): Promise<string> {
  return manager.resources.deleteResource(
    {
      group: params.group,
      version: params.version,
      resourceKind: params.resourceType,
      namespace: params.namespace ?? '',
      name: params.name,
    },
    { force: params.force },
  );
}

/**
 * Parse a single-document manifest. JSON is accepted since it is valid YAML.
 */
export function parseManifest(manifest: string): KubeDocument {
  let parsed: unknown;
  try {
    parsed = yaml.load(manifest);
  } catch (error) {
    throw new ValidationError(
      `failed to parse manifest: ${error instanceof Error ? error.message : String(error)}`,
      ['manifest'],
    );
  }
  if (!isRecord(parsed)) {
    throw new ValidationError('manifest must describe a single object', ['manifest']);
  }
  return parsed;
}

/**
 * Split `apiVersion` into group and version; `v1` is the core group.
 */
export function descriptorFor(document: KubeDocument, resourceType = '', namespace = ''): ResourceDescriptor {
  const apiVersion = stringField(document, 'apiVersion');
  const kind = stringField(document, 'kind');
  if (apiVersion === '' || (kind === '' && resourceType === '')) {
    throw new ValidationError('manifest must set apiVersion and kind', ['manifest']);
  }
  const slash = apiVersion.lastIndexOf('/');
  return {
    group: slash === -1 ? '' : apiVersion.slice(0, slash),
    version: slash === -1 ? apiVersion : apiVersion.slice(slash + 1),
    resourceKind: resourceType || kind.toLowerCase(),
    namespace,
    name: '',
  };
}

export async function createResource(params: CreateResourceParams, manager: ClusterManager): Promise<string> {
  const document = parseManifest(params.manifest);
  const descriptor = descriptorFor(document, params.resourceType, params.namespace);
  const created = await manager.resources.createResource(descriptor, document);

  const kind = stringField(created, 'kind') || stringField(document, 'kind');
  const name = stringField(created, 'metadata', 'name') || stringField(document, 'metadata', 'name');
  return `${kind} "${name}" created successfully`;
}

export const resourceTools: ClusterTool[] = [
  defineTool({
    name: 'get_resource',
    description: 'Get any Kubernetes resource as YAML',
    schema: getResourceSchema,
    run: (params, manager) => getResource(params, manager),
  }),
  defineTool({
    name: 'list_resources',
    description: 'List Kubernetes resources of one type',
    schema: listResourcesSchema,
    run: (params, manager) => listResources(params, manager),
  }),
  defineTool({
    name: 'create_resource',
    description: 'Create a Kubernetes resource from a YAML or JSON manifest',
    schema: createResourceSchema,
    run: (params, manager) => createResource(params, manager),
  }),
  defineTool({
    name: 'delete_resource',
    description: 'Delete a Kubernetes resource',
    schema: deleteResourceSchema,
    run: (params, manager) => deleteResource(params, manager),
  }),
];
