/**
 * Kubeconfig loading
 *
 * Resolves a kubeconfig path, reads it and validates the parts the registry
 * relies on. The raw content is handed on to the connector untouched.
 */

import { promises as fs, type Stats } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../errors/index';
import type { LoadedClusterConfig } from './types';

const namedContextSchema = z.object({
  name: z.string().min(1),
  context: z
    .object({
      cluster: z.string().optional(),
      user: z.string().optional(),
      namespace: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

const namedClusterSchema = z.object({
  name: z.string().min(1),
  cluster: z
    .object({
      server: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

const kubeconfigSchema = z
  .object({
    'current-context': z.string().optional(),
    contexts: z.array(namedContextSchema).nullish(),
    clusters: z.array(namedClusterSchema).nullish(),
  })
  .passthrough();

export type Kubeconfig = z.infer<typeof kubeconfigSchema>;

/**
 * Expand `~` and fall back to `fallback` (a KUBECONFIG-style list, first
 * entry wins) or `~/.kube/config` when no path is given.
 */
export function resolveKubeconfigPath(input: string, fallback = ''): string {
  let candidate = input.trim();
  if (candidate === '') {
    candidate = fallback.split(path.delimiter).find((entry) => entry.trim() !== '') ?? '';
  }
  if (candidate === '') {
    return path.join(os.homedir(), '.kube', 'config');
  }
  if (candidate === '~' || candidate.startsWith('~/')) {
    candidate = path.join(os.homedir(), candidate.slice(1));
  }
  return path.resolve(candidate);
}

export function parseKubeconfig(content: string, source: string): Kubeconfig {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigError(
      `failed to parse kubeconfig "${source}": ${errorMessage(error)}`,
      source,
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = kubeconfigSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`invalid kubeconfig "${source}": ${issues.join('; ')}`, source, undefined, {
      issues,
    });
  }
  return parsed.data;
}

/**
 * Read and validate the kubeconfig at `input`.
 */
export async function loadKubeconfig(input: string, fallback = ''): Promise<LoadedClusterConfig> {
  const resolved = resolveKubeconfigPath(input, fallback);

  let stats: Stats;
  try {
    stats = await fs.stat(resolved);
  } catch (error) {
    throw new ConfigError(
      `kubeconfig file not found: ${resolved}`,
      resolved,
      error instanceof Error ? error : undefined,
    );
  }
  if (stats.isDirectory()) {
    throw new ConfigError(`kubeconfig path is a directory, not a file: ${resolved}`, resolved);
  }

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `failed to read kubeconfig "${resolved}": ${errorMessage(error)}`,
      resolved,
      error instanceof Error ? error : undefined,
    );
  }

  const kubeconfig = parseKubeconfig(content, resolved);
  const currentContext = kubeconfig['current-context'] ?? '';
  if (currentContext === '') {
    throw new ConfigError('no current context found in kubeconfig file', resolved);
  }

  const contexts = kubeconfig.contexts ?? [];
  const active = contexts.find((entry) => entry.name === currentContext)?.context;
  const cluster = (kubeconfig.clusters ?? []).find((entry) => entry.name === active?.cluster);

  return {
    path: resolved,
    content,
    currentContext,
    contexts: contexts.map((entry) => entry.name),
    cluster: active?.cluster,
    user: active?.user,
    namespace: active?.namespace,
    server: cluster?.cluster?.server,
  };
}
