import { z } from 'zod';

const resourceTarget = {
  resourceType: z.string().min(1, 'must be a non-empty string').describe('Resource type, e.g. "deployments", "svc" or "configmap"'),
  group: z.string().optional().default('').describe('API group; empty searches the core group first'),
  version: z.string().optional().default('').describe('API version; empty uses the preferred version'),
};

export const getResourceSchema = z.object({
  ...resourceTarget,
  name: z.string().min(1, 'must be a non-empty string').describe('Name of the resource'),
  namespace: z.string().optional().describe('Namespace (defaults to the current namespace)'),
});

export const listResourcesSchema = z.object({
  ...resourceTarget,
  allNamespaces: z.boolean().optional().default(false).describe('List across all namespaces'),
  namespace: z.string().optional().describe('Namespace (defaults to the current namespace)'),
  labelSelector: z.string().optional(),
  fieldSelector: z.string().optional(),
  limit: z.number().int().nonnegative().optional(),
});

export const deleteResourceSchema = z.object({
  ...resourceTarget,
  name: z.string().min(1, 'must be a non-empty string').describe('Name of the resource'),
  namespace: z.string().optional().describe('Namespace (defaults to the current namespace)'),
  force: z.boolean().optional().default(false).describe('Delete immediately with a zero grace period'),
});

export const createResourceSchema = z.object({
  manifest: z.string().min(1, 'must be a non-empty string').describe('YAML or JSON manifest of a single resource'),
  resourceType: z.string().optional().describe('Resource type; derived from the manifest kind when omitted'),
  namespace: z.string().optional().describe('Namespace (defaults to the manifest namespace, then the current one)'),
});

export type GetResourceParams = z.infer<typeof getResourceSchema>;
export type ListResourcesParams = z.infer<typeof listResourcesSchema>;
export type DeleteResourceParams = z.infer<typeof deleteResourceSchema>;
export type CreateResourceParams = z.infer<typeof createResourceSchema>;
