/**
 * Context Tools
 *
 * Register kubeconfig files as named cluster sessions and move the current
 * cluster and namespace between them.
 *
 * @example
 * ```typescript
 * const [tool] = contextTools.filter((t) => t.name === 'load_kubeconfig');
 * const result = await tool.bind(manager).execute({ name: 'prod', path: '/etc/kube/prod' }, logger);
 * ```
 */

import type { ClusterSessionInfo } from '../../domain/types';
import type { ClusterManager } from '../../services/kubernetes/index';
import { defineTool, type ClusterTool } from '../types';
import {
  deleteContextSchema,
  describeContextSchema,
  getCurrentContextSchema,
  listContextsSchema,
  loadKubeconfigSchema,
  renameContextSchema,
  setNamespaceSchema,
  switchContextSchema,
  type DeleteContextParams,
  type DescribeContextParams,
  type LoadKubeconfigParams,
  type RenameContextParams,
  type SetNamespaceParams,
  type SwitchContextParams,
} from './schema';

export function listContexts(manager: ClusterManager): string {
  const contexts = manager.registry.describeAll();
  if (contexts.length === 0) {
    return 'No contexts available';
  }

  const lines = ['Available contexts:'];
  for (const info of contexts) {
    lines.push(
      `${info.current ? '*' : ' '} ${info.name}`,
      `  Cluster: ${info.cluster ?? ''}`,
      `  User: ${info.user ?? ''}`,
      `  Namespace: ${info.namespace ?? ''}`,
      '',
    );
  }
  lines.push(`Total: ${contexts.length} context(s)`);
  return lines.join('\n');
}

export function getCurrentContext(manager: ClusterManager): string {
  const name = manager.registry.getCurrentContext();
  if (name === '') {
    return 'No active context';
  }
  const info = manager.registry.describe(name);
  return [
    `Current context: ${info.name}`,
    `Cluster: ${info.cluster ?? ''}`,
    `User: ${info.user ?? ''}`,
    `Namespace: ${manager.registry.getCurrentNamespace()}`,
    `Server: ${info.server ?? ''}`,
  ].join('\n');
}

export function switchContext(params: SwitchContextParams, manager: ClusterManager): string {
  manager.registry.setCurrentContext(params.name);
  return `Switched to context '${params.name}'`;
}

export async function loadKubeconfig(params: LoadKubeconfigParams, manager: ClusterManager): Promise<string> {
  const info = await manager.registry.register(params.name, params.path ?? '');
  return `Successfully loaded kubeconfig from '${info.sourcePath}' as context '${info.name}'`;
}

export function deleteContext(params: DeleteContextParams, manager: ClusterManager): string {
  manager.registry.remove(params.name);
  return `Successfully deleted context '${params.name}'`;
}

export function renameContext(params: RenameContextParams, manager: ClusterManager): string {
  manager.registry.rename(params.oldName, params.newName);
  return `Successfully renamed context '${params.oldName}' to '${params.newName}'`;
}

export function formatContextInfo(info: ClusterSessionInfo): string {
  return [
    `Context: ${info.name}`,
    `Kubeconfig context: ${info.declaredContext}`,
    `Cluster: ${info.cluster ?? ''}`,
    `User: ${info.user ?? ''}`,
    `Namespace: ${info.namespace ?? ''}`,
    `Server: ${info.server ?? ''}`,
    `Config Path: ${info.sourcePath}`,
    `Active: ${info.current ? 'yes' : 'no'}`,
  ].join('\n');
}

export function describeContext(params: DescribeContextParams, manager: ClusterManager): string {
  return formatContextInfo(manager.registry.describe(params.name));
}

export function setNamespace(params: SetNamespaceParams, manager: ClusterManager): string {
  manager.registry.setCurrentNamespace(params.namespace);
  return `Current namespace set to '${manager.registry.getCurrentNamespace()}'`;
}

export const contextTools: ClusterTool[] = [
  defineTool({
    name: 'list_contexts',
    description: 'List all registered Kubernetes contexts',
    schema: listContextsSchema,
    run: async (_params, manager) => listContexts(manager),
  }),
  defineTool({
    name: 'get_current_context',
    description: 'Get the currently active Kubernetes context',
    schema: getCurrentContextSchema,
    run: async (_params, manager) => getCurrentContext(manager),
  }),
  defineTool({
    name: 'switch_context',
    description: 'Switch to a different Kubernetes context',
    schema: switchContextSchema,
    run: async (params, manager) => switchContext(params, manager),
  }),
  defineTool({
    name: 'load_kubeconfig',
    description: 'Load a kubeconfig file and register it as a new context',
    schema: loadKubeconfigSchema,
    run: (params, manager) => loadKubeconfig(params, manager),
  }),
  defineTool({
    name: 'delete_context',
    description: 'Remove a context from the manager',
    schema: deleteContextSchema,
    run: async (params, manager) => deleteContext(params, manager),
  }),
  defineTool({
    name: 'rename_context',
    description: 'Rename an existing context',
    schema: renameContextSchema,
    run: async (params, manager) => renameContext(params, manager),
  }),
  defineTool({
    name: 'describe_context',
    description: 'Get detailed information about a specific context',
    schema: describeContextSchema,
    run: async (params, manager) => describeContext(params, manager),
  }),
  defineTool({
    name: 'set_namespace',
    description: 'Set the namespace used when an operation does not name one',
    schema: setNamespaceSchema,
    run: async (params, manager) => setNamespace(params, manager),
  }),
];
