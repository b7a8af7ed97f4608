/**
 * Shared plumbing for operations against the current cluster
 */

import type { Logger } from 'pino';
import type { RetryConfig, TimeoutConfig } from '../../config/types';
import type { CallOptions } from '../../domain/types';
import { NotFoundError, isNotFoundError } from '../../errors/index';
import { createTimer } from '../../lib/logger';
import { abortable, retry, withTimeout } from '../../shared/async';
import type { ClusterSession, ConnectionRegistry } from './registry';

export interface OperationSettings {
  registry: ConnectionRegistry;
  timeouts: TimeoutConfig;
  retry: RetryConfig;
  logger: Logger;
}

/**
 * Runs one remote step with retry, bound to the enclosing deadline
 */
export type Step = <T>(name: string, fn: (signal: AbortSignal) => Promise<T>) => Promise<T>;

export abstract class ClusterOperations {
  protected readonly registry: ConnectionRegistry;
  protected readonly timeouts: TimeoutConfig;
  protected readonly retryPolicy: RetryConfig;
  protected readonly logger: Logger;

  protected constructor(settings: OperationSettings, component: string) {
    this.registry = settings.registry;
    this.timeouts = settings.timeouts;
    this.retryPolicy = settings.retry;
    this.logger = settings.logger.child({ component });
  }

  protected namespaceOrCurrent(namespace: string | undefined): string {
    const trimmed = namespace?.trim() ?? '';
    return trimmed === '' ? this.registry.getCurrentNamespace() : trimmed;
  }

  /**
   * Run `body` under a single deadline. Each remote step inside it is
   * retried on its own, and every step shares the deadline.
   */
  protected async run<T>(
    operation: string,
    deadline: keyof TimeoutConfig,
    call: CallOptions,
    body: (step: Step, signal: AbortSignal) => Promise<T>,
    context: Record<string, unknown> = {},
  ): Promise<T> {
    const timer = createTimer(this.logger, operation, context);
    try {
      const result = await withTimeout(
        (signal) => {
          const step: Step = (name, fn) =>
            retry(() => abortable(fn(signal), signal, name), {
              ...this.retryPolicy,
              signal,
              operation: name,
              logger: this.logger,
            });
          return body(step, signal);
        },
        this.timeouts[deadline],
        { signal: call.signal, operation },
      );
      timer.end();
      return result;
    } catch (error) {
      timer.error(error);
      throw error;
    }
  }

  /**
   * Best-effort check that the namespace exists before touching it
   */
  protected async ensureNamespace(session: ClusterSession, namespace: string, step: Step): Promise<void> {
    try {
      await step('read namespace', (signal) => session.typed.readNamespace(namespace, { signal }));
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new NotFoundError(`namespace "${namespace}" not found`, 'namespace', namespace);
      }
      throw error;
    }
  }
}
