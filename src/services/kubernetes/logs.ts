/**
 * Log Stream Reader
 *
 * Reads a container's logs under a byte ceiling and decorates them with a
 * header naming what was read.
 */

import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { LOG_BYTE_CEILING, LOG_TRUNCATION_NOTICE } from '../../config/defaults';
import {
  arrayField,
  stringField,
  type CallOptions,
  type KubeDocument,
  type LogRequest,
  type LogStreamResult,
} from '../../domain/types';
import { CancelledError, NotFoundError, ValidationError, isNotFoundError } from '../../errors/index';
import { formatDuration, parseDuration } from '../../shared/duration';
import { ClusterOperations, type OperationSettings } from './operations';

const LOGGABLE_PHASES = new Set(['Running', 'Succeeded']);

export interface LogStreamReaderSettings extends OperationSettings {
  byteCeiling?: number;
}

export interface BoundedRead {
  text: string;
  bytes: number;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError('unexpected chunk type in log stream');
}

/**
 * Read at most `ceiling` bytes of UTF-8 text. A multi-byte sequence cut by
 * the ceiling is dropped rather than decoded as a replacement character.
 * The stream is destroyed once reading stops.
 */
export async function readBounded(stream: Readable, ceiling: number, signal?: AbortSignal): Promise<BoundedRead> {
  const decoder = new StringDecoder('utf8');
  const onAbort = (): void => {
    stream.destroy();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  let text = '';
  let bytes = 0;
  try {
    const chunks: AsyncIterable<unknown> = stream;
    for await (const chunk of chunks) {
      if (signal?.aborted) {
        throw signal.reason instanceof Error ? signal.reason : new CancelledError('log read was cancelled');
      }
      const slice = toBuffer(chunk).subarray(0, ceiling - bytes);
      bytes += slice.length;
      text += decoder.write(slice);
      if (bytes >= ceiling) {
        return { text, bytes };
      }
    }
    return { text: text + decoder.end(), bytes };
  } finally {
    signal?.removeEventListener('abort', onAbort);
    stream.destroy();
  }
}

export function formatLogHeader(
  container: string,
  namespace: string,
  pod: string,
  request: Pick<LogRequest, 'previous' | 'tailLines' | 'since'>,
): string {
  const options: string[] = [];
  if (request.previous) options.push('previous=true');
  if (request.tailLines && request.tailLines > 0) options.push(`tail=${request.tailLines}`);
  if (request.since) options.push(`since=${formatDuration(parseDuration(request.since))}`);

  let header = `Logs from container '${container}' in pod '${namespace}/${pod}'`;
  if (options.length > 0) {
    header += ` (${options.join(', ')})`;
  }
  return `${header}:\n\n`;
}

export class LogStreamReader extends ClusterOperations {
  private readonly byteCeiling: number;

  constructor(settings: LogStreamReaderSettings) {
    super(settings, 'log-stream-reader');
    this.byteCeiling = settings.byteCeiling ?? LOG_BYTE_CEILING;
  }

  async streamLogs(request: LogRequest, call: CallOptions = {}): Promise<LogStreamResult> {
    if (request.podName.trim() === '') {
      throw new ValidationError('pod name must be specified', ['podName']);
    }
    const sinceSeconds =
      request.since !== undefined && request.since !== ''
        ? Math.max(1, Math.floor(parseDuration(request.since) / 1000))
        : undefined;
    const session = this.registry.current();
    const namespace = this.namespaceOrCurrent(request.namespace);
    const { podName, previous } = request;

    return this.run(
      'stream-logs',
      'logs',
      call,
      async (step, signal) => {
        await this.ensureNamespace(session, namespace, step);

        let pod: KubeDocument;
        try {
          pod = await step('read pod', (s) => session.typed.readPod(podName, namespace, { signal: s }));
        } catch (error) {
          if (isNotFoundError(error)) {
            throw new NotFoundError(`pod '${podName}' not found in namespace '${namespace}'`, 'pod', podName);
          }
          throw error;
        }

        const phase = stringField(pod, 'status', 'phase');
        if (!LOGGABLE_PHASES.has(phase) && !previous) {
          throw new ValidationError(
            `pod '${podName}' is in '${phase}' state. Logs may not be available. Use previous=true for crashed containers`,
            ['previous'],
            { phase },
          );
        }

        const containers = arrayField(pod, 'spec', 'containers').map((entry) => stringField(entry, 'name'));
        const [firstContainer] = containers;
        if (firstContainer === undefined) {
          throw new NotFoundError(`no containers found in pod '${podName}'`, 'container');
        }
        const container = request.containerName || firstContainer;
        if (!containers.includes(container)) {
          throw new NotFoundError(
            `container '${container}' not found in pod '${podName}'. Available containers: ${containers.join(', ')}`,
            'container',
            container,
          );
        }

        const stream = await step('open log stream', (s) =>
          session.typed.openPodLogStream(
            {
              podName,
              namespace,
              container,
              previous,
              tailLines: request.tailLines && request.tailLines > 0 ? request.tailLines : undefined,
              sinceSeconds,
              limitBytes: this.byteCeiling,
            },
            { signal: s },
          ),
        );
        const { text, bytes } = await readBounded(stream, this.byteCeiling, signal);

        if (bytes === 0) {
          const which = previous ? 'previous logs' : 'logs';
          throw new NotFoundError(`no ${which} found for container '${container}' in pod '${podName}'`, 'logs');
        }

        const truncated = bytes === this.byteCeiling;
        this.logger.debug({ pod: podName, namespace, container, bytes, truncated }, 'Read container logs');

        return {
          text: formatLogHeader(container, namespace, podName, request) + text + (truncated ? LOG_TRUNCATION_NOTICE : ''),
          truncated,
          container,
          namespace,
        };
      },
      { pod: podName, namespace },
    );
  }
}
