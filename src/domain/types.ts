/**
 * Core type definitions for cluster sessions and resource operations.
 * Provides the Result type for tool handlers and the shapes passed between
 * the registry, the resource translator and the log reader.
 */

import type { Logger } from 'pino';

/**
 * Result type for tool handlers. Tool output is always a serialisable value;
 * failures travel as a message instead of an exception.
 *
 * @example
 * ```typescript
 * const result = await tool.execute({ name: 'web' }, logger);
 * if (!result.ok) {
 *   logger.error(result.error);
 *   return;
 * }
 * console.log(result.value);
 * ```
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/** Create a failure result */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

/** Type guard to check if result is a failure */
export const isFail = <T>(result: Result<T>): result is { ok: false; error: string } => !result.ok;

/**
 * Tool definition exposed to a tool-invocation front end.
 */
export interface Tool {
  /** Unique tool identifier */
  name: string;
  /** Human-readable tool description */
  description?: string;
  /** JSON schema for parameter validation */
  schema?: Record<string, unknown>;
  /**
   * Executes the tool with provided parameters.
   * @returns Result with the tool's text output or an error message
   */
  execute: (params: Record<string, unknown>, logger: Logger) => Promise<Result<string>>;
}

// ===== KUBERNETES DOCUMENTS =====

/**
 * A resource document as returned by (or sent to) the cluster API.
 */
export type KubeDocument = Record<string, unknown>;

export interface KubeDocumentList {
  items: KubeDocument[];
  /** Continuation token when the server paginated the result */
  continueToken?: string;
}

/**
 * Addresses a resource through the generic path. `resourceKind` is a plural
 * resource name; singular and short names are resolved through discovery.
 * Empty group and version trigger discovery across every served group.
 */
export interface ResourceDescriptor {
  group: string;
  version: string;
  resourceKind: string;
  namespace: string;
  name: string;
}

/**
 * A descriptor after discovery has pinned the group, version and kind.
 */
export interface ResolvedResource {
  group: string;
  version: string;
  /** Plural resource name, e.g. `deployments` */
  resource: string;
  /** Object kind, e.g. `Deployment` */
  kind: string;
  namespaced: boolean;
}

export interface ListOptions {
  namespace?: string;
  limit?: number;
  labelSelector?: string;
  fieldSelector?: string;
}

export interface DeleteOptions {
  force?: boolean;
}

/**
 * Per-call options accepted by every remote operation. Aborting the signal
 * tears down the HTTP request in flight.
 */
export interface CallOptions {
  signal?: AbortSignal;
}

// ===== LOGS =====

export interface LogRequest {
  podName: string;
  namespace: string;
  containerName?: string;
  tailLines?: number;
  previous: boolean;
  /** Duration such as `90s`, `5m` or `1h30m` */
  since?: string;
}

export interface LogStreamResult {
  text: string;
  truncated: boolean;
  container: string;
  namespace: string;
}

// ===== DEPLOYMENTS =====

export type ImagePullPolicy = 'Always' | 'IfNotPresent' | 'Never';

export type PortProtocol = 'TCP' | 'UDP' | 'SCTP';

export interface DeploymentParams {
  name: string;
  image: string;
  namespace: string;
  replicas: number;
  labels?: Record<string, string>;
  /** `port[/protocol]`, e.g. `8080/TCP` */
  containerPort?: string;
  env?: Record<string, unknown>;
  imagePullPolicy?: string;
  imagePullSecrets?: unknown[];
}

// ===== SESSIONS =====

/**
 * Immutable snapshot of a registered cluster session.
 */
export interface ClusterSessionInfo {
  readonly name: string;
  readonly sourcePath: string;
  readonly declaredContext: string;
  readonly server?: string;
  readonly cluster?: string;
  readonly user?: string;
  readonly namespace?: string;
  readonly current: boolean;
}

// ===== DOCUMENT ACCESSORS =====

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function field(document: unknown, ...path: string[]): unknown {
  let current: unknown = document;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function stringField(document: unknown, ...path: string[]): string {
  const value = field(document, ...path);
  return typeof value === 'string' ? value : '';
}

export function arrayField(document: unknown, ...path: string[]): unknown[] {
  const value = field(document, ...path);
  return Array.isArray(value) ? value : [];
}

export function numberField(document: unknown, ...path: string[]): number | undefined {
  const value = field(document, ...path);
  return typeof value === 'number' ? value : undefined;
}
