/**
 * Pod Tools
 *
 * Pod listing, inspection, deletion and bounded log reads against the
 * current cluster.
 */

import type { ClusterManager } from '../../services/kubernetes/index';
import { formatPod, formatPodList } from '../../services/kubernetes/formatter';
import { defineTool, type ClusterTool } from '../types';
import {
  deletePodSchema,
  getPodSchema,
  listPodsSchema,
  streamLogsSchema,
  type DeletePodParams,
  type GetPodParams,
  type ListPodsParams,
  type StreamLogsParams,
} from './schema';

export async function listPods(params: ListPodsParams, manager: ClusterManager): Promise<string> {
  const namespace = params.allNamespaces
    ? ''
    : params.namespace?.trim() || manager.registry.getCurrentNamespace();

  const { items } = await manager.resources.listPods({
    namespace,
    limit: params.limit,
    labelSelector: params.labelSelector,
    fieldSelector: params.fieldSelector,
  });

  const header = namespace === '' ? 'Pods across all namespaces:' : `Pods in namespace '${namespace}':`;
  return `${header}\n${formatPodList(items, { allNamespaces: namespace === '', limit: params.limit })}`;
}

export async function getPod(params: GetPodParams, manager: ClusterManager): Promise<string> {
  const pod = await manager.resources.getPod(params.name, params.namespace);
  return formatPod(pod);
}

export function deletePod(params: DeletePodParams, manager: ClusterManager): Promise<string> {
  return manager.resources.deletePod(params.name, params.namespace, { force: params.force });
}

export async function streamLogs(params: StreamLogsParams, manager: ClusterManager): Promise<string> {
  const result = await manager.logs.streamLogs({
    podName: params.pod,
    namespace: params.namespace ?? '',
    containerName: params.container,
    tailLines: params.tail,
    previous: params.previous,
    since: params.since,
  });
  return result.text;
}

export const podTools: ClusterTool[] = [
  defineTool({
    name: 'list_pods',
    description: 'List pods in the current namespace or across all namespaces',
    schema: listPodsSchema,
    run: (params, manager) => listPods(params, manager),
  }),
  defineTool({
    name: 'get_pod',
    description: 'Get detailed information about a specific pod',
    schema: getPodSchema,
    run: (params, manager) => getPod(params, manager),
  }),
  defineTool({
    name: 'delete_pod',
    description: 'Delete a pod by name',
    schema: deletePodSchema,
    run: (params, manager) => deletePod(params, manager),
  }),
  defineTool({
    name: 'stream_logs',
    description: 'Read logs from a container in a pod (at most 100 KiB)',
    schema: streamLogsSchema,
    run: (params, manager) => streamLogs(params, manager),
  }),
];
