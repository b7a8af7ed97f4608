import { z } from 'zod';

export const listDeploymentsSchema = z.object({
  allNamespaces: z.boolean().optional().default(false).describe('List deployments across all namespaces'),
  namespace: z.string().optional().describe('Namespace (defaults to the current namespace)'),
  labelSelector: z.string().optional().describe('Label selector, e.g. "app=web"'),
});

export const createDeploymentSchema = z.object({
  name: z.string().min(1, 'must be a non-empty string').describe('Name of the deployment'),
  namespace: z.string().optional().describe('Namespace (defaults to the current namespace)'),
  image: z.string().min(1, 'must be a non-empty string').describe('Container image'),
  replicas: z.number().int().nonnegative().optional().default(1).describe('Number of replicas'),
  labels: z.record(z.string()).optional().describe('Labels added to the deployment and its pods'),
  containerPort: z.string().optional().describe('Container port as "port[/protocol]", e.g. "8080/TCP"'),
  env: z.record(z.unknown()).optional().describe('Environment variables; non-string values are ignored'),
  imagePullPolicy: z.string().optional().describe('Always, IfNotPresent or Never'),
  imagePullSecrets: z.array(z.unknown()).optional().describe('Names of image pull secrets'),
});

export type ListDeploymentsParams = z.infer<typeof listDeploymentsSchema>;
export type CreateDeploymentParams = z.infer<typeof createDeploymentSchema>;
