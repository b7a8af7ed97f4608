import { z } from 'zod';

const podName = z.string().min(1, 'must be a non-empty string');
const namespace = z.string().optional().describe('Namespace (defaults to the current namespace)');

export const listPodsSchema = z.object({
  allNamespaces: z.boolean().optional().default(false).describe('List pods across all namespaces'),
  namespace,
  labelSelector: z.string().optional().describe('Label selector, e.g. "app=web"'),
  fieldSelector: z.string().optional().describe('Field selector, e.g. "status.phase=Running"'),
  limit: z.number().int().nonnegative().optional().describe('Maximum number of pods to return'),
});

export const getPodSchema = z.object({
  name: podName.describe('Name of the pod'),
  namespace,
});

export const deletePodSchema = z.object({
  name: podName.describe('Name of the pod to delete'),
  namespace,
  force: z.boolean().optional().default(false).describe('Delete immediately with a zero grace period'),
});

export const streamLogsSchema = z.object({
  pod: podName.describe('Name of the pod'),
  container: z.string().optional().describe('Container name (defaults to the first container)'),
  namespace,
  tail: z.number().int().nonnegative().optional().describe('Number of lines from the end of the log'),
  previous: z.boolean().optional().default(false).describe('Read logs of the previous container instance'),
  since: z.string().optional().describe('Only return logs newer than a duration such as 90s, 5m or 1h30m'),
});

export type ListPodsParams = z.infer<typeof listPodsSchema>;
export type GetPodParams = z.infer<typeof getPodSchema>;
export type DeletePodParams = z.infer<typeof deletePodSchema>;
export type StreamLogsParams = z.infer<typeof streamLogsSchema>;
