/**
 * Tool registry
 */

import type { Tool } from '../domain/types';
import type { ClusterManager } from '../services/kubernetes/index';
import { contextTools } from './context/index';
import { deploymentTools } from './deployment/index';
import { podTools } from './pod/index';
import { resourceTools } from './resource/index';
import type { ClusterTool } from './types';

export const clusterTools: readonly ClusterTool[] = [
  ...contextTools,
  ...podTools,
  ...deploymentTools,
  ...resourceTools,
];

/**
 * Bind every tool to one cluster manager
 */
export function createToolRegistry(manager: ClusterManager): Tool[] {
  return clusterTools.map((tool) => tool.bind(manager));
}

export { defineTool, type ClusterTool, type ToolSpec } from './types';
export * from './context/index';
export * from './pod/index';
export * from './deployment/index';
export * from './resource/index';
