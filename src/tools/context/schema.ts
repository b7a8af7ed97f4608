import { z } from 'zod';

const contextName = z.string().min(1, 'must be a non-empty string');

export const listContextsSchema = z.object({});

export const getCurrentContextSchema = z.object({});

export const switchContextSchema = z.object({
  name: contextName.describe('Name of the context to switch to'),
});

export const loadKubeconfigSchema = z.object({
  name: contextName.describe('Name to assign to this context'),
  path: z
    .string()
    .optional()
    .describe('Path to the kubeconfig file (defaults to KUBECONFIG or ~/.kube/config)'),
});

export const deleteContextSchema = z.object({
  name: contextName.describe('Name of the context to delete'),
});

export const renameContextSchema = z.object({
  oldName: contextName.describe('Current name of the context'),
  newName: contextName.describe('New name for the context'),
});

export const describeContextSchema = z.object({
  name: contextName.describe('Name of the context to describe'),
});

export const setNamespaceSchema = z.object({
  namespace: z.string().describe('Namespace used when an operation names none; empty resets to "default"'),
});

export type SwitchContextParams = z.infer<typeof switchContextSchema>;
export type LoadKubeconfigParams = z.infer<typeof loadKubeconfigSchema>;
export type DeleteContextParams = z.infer<typeof deleteContextSchema>;
export type RenameContextParams = z.infer<typeof renameContextSchema>;
export type DescribeContextParams = z.infer<typeof describeContextSchema>;
export type SetNamespaceParams = z.infer<typeof setNamespaceSchema>;
