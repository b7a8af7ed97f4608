/**
 * Connection Registry
 *
 * Owns the registered cluster sessions and the current cluster/namespace.
 * Every accessor runs to completion synchronously on the event loop, which
 * makes each one a critical section: readers never observe a half-applied
 * write. Remote calls (the registration liveness check) happen before the commit
 * section and never while registry state is being read or written.
 */

import type { Logger } from 'pino';
import type { RetryConfig, TimeoutConfig } from '../../config/types';
import { DEFAULT_NAMESPACE, NO_CLUSTERS_MESSAGE } from '../../config/defaults';
import type { CallOptions, ClusterSessionInfo } from '../../domain/types';
import {
  ConfigError,
  ConnectionError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isCancelledError,
  isConfigError,
} from '../../errors/index';
import { createTimer } from '../../lib/logger';
import { runRemote } from '../../shared/async';
import { loadKubeconfig } from '../../infrastructure/kubernetes/config-loader';
import type {
  ClusterConnection,
  ClusterConnector,
  GenericResourceOps,
  LoadedClusterConfig,
  TypedResourceOps,
} from '../../infrastructure/kubernetes/types';

/**
 * A registered cluster. Frozen on creation and replaced, never mutated.
 */
export interface ClusterSession {
  readonly name: string;
  readonly typed: TypedResourceOps;
  readonly generic: GenericResourceOps;
  readonly sourcePath: string;
  readonly declaredContext: string;
  readonly server?: string;
  readonly cluster?: string;
  readonly user?: string;
  readonly namespace?: string;
}

export interface ConnectionRegistryOptions {
  connector: ClusterConnector;
  logger: Logger;
  timeouts: TimeoutConfig;
  retry: RetryConfig;
  defaultNamespace?: string;
  /** Used when `register` is called without a path (KUBECONFIG-style list) */
  kubeconfigFallback?: string;
  loadConfig?: (path: string, fallback: string) => Promise<LoadedClusterConfig>;
}

function normalizeNamespace(namespace: string): string {
  return namespace === '' ? DEFAULT_NAMESPACE : namespace;
}

export class ConnectionRegistry {
  private readonly sessions = new Map<string, ClusterSession>();
  /** Highest registration ticket committed (or invalidated by removal) per name */
  private readonly committed = new Map<string, number>();
  private currentContextName = '';
  private currentNamespace: string;
  private lastTicket = 0;

  private readonly connector: ClusterConnector;
  private readonly logger: Logger;
  private readonly timeouts: TimeoutConfig;
  private readonly retry: RetryConfig;
  private readonly kubeconfigFallback: string;
  private readonly loadConfig: (path: string, fallback: string) => Promise<LoadedClusterConfig>;

  constructor(options: ConnectionRegistryOptions) {
    this.connector = options.connector;
    this.logger = options.logger.child({ component: 'connection-registry' });
    this.timeouts = options.timeouts;
    this.retry = options.retry;
    this.kubeconfigFallback = options.kubeconfigFallback ?? '';
    this.loadConfig = options.loadConfig ?? loadKubeconfig;
    this.currentNamespace = normalizeNamespace(options.defaultNamespace ?? DEFAULT_NAMESPACE);
  }

  /**
   * Load a kubeconfig, check that the cluster answers and store the session under `name`.
   * Replaces an existing session of the same name unless a newer
   * registration of that name has already been committed.
   */
  async register(name: string, path: string, call: CallOptions = {}): Promise<ClusterSessionInfo> {
    if (name.trim() === '') {
      throw new ConfigError('cluster name must not be empty', path);
    }
    const ticket = ++this.lastTicket;
    const timer = createTimer(this.logger, 'register-cluster', { cluster: name });

    try {
      const config = await this.loadConfig(path, this.kubeconfigFallback);
      const connection = this.connect(name, config);
      await this.checkLiveness(name, connection, call);
      const info = this.commit(name, ticket, config, connection);
      timer.end({ server: info.server });
      return info;
    } catch (error) {
      timer.error(error);
      throw error;
    }
  }

  private connect(name: string, config: LoadedClusterConfig): ClusterConnection {
    try {
      return this.connector.connect(config);
    } catch (error) {
      throw new ConfigError(
        `failed to create client for cluster "${name}": ${errorMessage(error)}`,
        config.path,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async checkLiveness(name: string, connection: ClusterConnection, call: CallOptions): Promise<void> {
    try {
      await runRemote(
        `check cluster "${name}"`,
        (signal) => connection.typed.listNamespaces({ limit: 1 }, { signal }),
        { timeoutMs: this.timeouts.read, signal: call.signal, retry: this.retry, logger: this.logger },
      );
    } catch (error) {
      if (isCancelledError(error) || isConfigError(error)) {
        throw error;
      }
      throw new ConnectionError(
        `failed to connect to cluster "${name}": ${errorMessage(error)}`,
        name,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private commit(
    name: string,
    ticket: number,
    config: LoadedClusterConfig,
    connection: ClusterConnection,
  ): ClusterSessionInfo {
    if ((this.committed.get(name) ?? 0) > ticket) {
      this.logger.warn({ cluster: name, ticket }, 'Discarding superseded cluster registration');
      if (!this.sessions.has(name)) {
        throw new NotFoundError(`cluster "${name}" was removed during registration`, 'cluster', name);
      }
      return this.describe(name);
    }

    const wasEmpty = this.sessions.size === 0;
    const session: ClusterSession = Object.freeze({
      name,
      typed: connection.typed,
      generic: connection.generic,
      sourcePath: config.path,
      declaredContext: config.currentContext,
      server: connection.server ?? config.server,
      cluster: config.cluster,
      user: config.user,
      namespace: config.namespace,
    });
    this.sessions.set(name, session);
    this.committed.set(name, ticket);

    if (wasEmpty || config.currentContext === name) {
      this.currentContextName = name;
    }

    this.logger.info(
      { cluster: name, server: session.server, current: this.currentContextName === name },
      'Cluster registered',
    );
    return this.describe(name);
  }

  lookup(name: string): ClusterSession {
    const session = this.sessions.get(name);
    if (!session) {
      throw new NotFoundError(`cluster "${name}" not found`, 'cluster', name);
    }
    return session;
  }

  /**
   * The current session, or an arbitrary registered one when the current
   * context names nothing that is registered.
   */
  current(): ClusterSession {
    const named = this.sessions.get(this.currentContextName);
    if (named) {
      return named;
    }
    const first = this.sessions.values().next();
    if (first.done) {
      throw new ConnectionError(NO_CLUSTERS_MESSAGE);
    }
    return first.value;
  }

  setCurrentContext(name: string): void {
    if (!this.sessions.has(name)) {
      throw new NotFoundError(`cluster "${name}" not found`, 'cluster', name);
    }
    this.currentContextName = name;
    this.logger.debug({ cluster: name }, 'Current context changed');
  }

  getCurrentContext(): string {
    return this.currentContextName;
  }

  setCurrentNamespace(namespace: string): void {
    this.currentNamespace = normalizeNamespace(namespace);
    this.logger.debug({ namespace: this.currentNamespace }, 'Current namespace changed');
  }

  getCurrentNamespace(): string {
    return this.currentNamespace;
  }

  listRegistered(): string[] {
    return [...this.sessions.keys()].sort();
  }

  /**
   * Drop a session. Registrations of the same name still in flight are
   * discarded when they finish.
   */
  remove(name: string): void {
    if (!this.sessions.has(name)) {
      throw new NotFoundError(`cluster "${name}" not found`, 'cluster', name);
    }
    this.sessions.delete(name);
    this.committed.set(name, this.lastTicket + 1);

    if (this.currentContextName === name) {
      const next = this.sessions.keys().next();
      this.currentContextName = next.done ? '' : next.value;
    }
    this.logger.info({ cluster: name, current: this.currentContextName }, 'Cluster removed');
  }

  /**
   * Move a session to a new name, keeping it current if it was. Registrations
   * of either name still in flight are discarded when they finish.
   */
  rename(oldName: string, newName: string): ClusterSessionInfo {
    if (oldName === newName) {
      throw new ValidationError('old and new cluster names must differ', ['newName']);
    }
    const session = this.lookup(oldName);
    if (this.sessions.has(newName)) {
      throw new ValidationError(`cluster "${newName}" already exists`, ['newName']);
    }

    this.sessions.delete(oldName);
    this.sessions.set(newName, Object.freeze({ ...session, name: newName }));
    const invalidated = this.lastTicket + 1;
    this.committed.set(oldName, invalidated);
    this.committed.set(newName, invalidated);

    if (this.currentContextName === oldName) {
      this.currentContextName = newName;
    }
    this.logger.info({ from: oldName, to: newName }, 'Cluster renamed');
    return this.describe(newName);
  }

  describe(name: string): ClusterSessionInfo {
    const session = this.lookup(name);
    return Object.freeze({
      name: session.name,
      sourcePath: session.sourcePath,
      declaredContext: session.declaredContext,
      server: session.server,
      cluster: session.cluster,
      user: session.user,
      namespace: session.namespace,
      current: this.currentContextName === name,
    });
  }

  describeAll(): ClusterSessionInfo[] {
    return this.listRegistered().map((name) => this.describe(name));
  }
}
