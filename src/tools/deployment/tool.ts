/**
 * Deployment Tools
 */

import type { ClusterManager } from '../../services/kubernetes/index';
import { formatDeploymentList } from '../../services/kubernetes/formatter';
import { defineTool, type ClusterTool } from '../types';
import {
  createDeploymentSchema,
  listDeploymentsSchema,
  type CreateDeploymentParams,
  type ListDeploymentsParams,
} from './schema';

export async function listDeployments(params: ListDeploymentsParams, manager: ClusterManager): Promise<string> {
  const namespace = params.allNamespaces
    ? ''
    : params.namespace?.trim() || manager.registry.getCurrentNamespace();

  const { items } = await manager.resources.listDeployments({
    namespace,
    labelSelector: params.labelSelector,
  });

  const header =
    namespace === '' ? 'Deployments across all namespaces:' : `Deployments in namespace '${namespace}':`;
  return `${header}\n${formatDeploymentList(items)}\n\nTotal: ${items.length} deployment(s)`;
}

export function createDeployment(params: CreateDeploymentParams, manager: ClusterManager): Promise<string> {
  return manager.resources.createDeployment({
    ...params,
    namespace: params.namespace ?? '',
  });
}

export const deploymentTools: ClusterTool[] = [
  defineTool({
    name: 'list_deployments',
    description: 'List deployments in the current namespace or across all namespaces',
    schema: listDeploymentsSchema,
    run: (params, manager) => listDeployments(params, manager),
  }),
  defineTool({
    name: 'create_deployment',
    description: 'Create a deployment running a single container',
    schema: createDeploymentSchema,
    run: (params, manager) => createDeployment(params, manager),
  }),
];
