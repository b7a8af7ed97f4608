/**
 * Text formatting for tool output
 */

import * as yaml from 'js-yaml';
import {
  arrayField,
  field,
  isRecord,
  numberField,
  stringField,
  type KubeDocument,
} from '../../domain/types';
import { formatAge } from '../../shared/duration';

export interface PodListFormatOptions {
  allNamespaces: boolean;
  limit?: number;
  now?: number;
}

function ageOf(document: KubeDocument, now: number): string {
  const created = Date.parse(stringField(document, 'metadata', 'creationTimestamp'));
  return Number.isNaN(created) ? 'unknown' : formatAge(now - created);
}

function labelLines(document: KubeDocument): string[] {
  const labels = field(document, 'metadata', 'labels');
  if (!isRecord(labels)) return [];
  return Object.entries(labels).map(([key, value]) => `- ${key}: ${String(value)}`);
}

function containerStatusLines(status: unknown): string[] {
  const ready = field(status, 'ready') === true ? 'Ready' : 'Not Ready';
  const lines = [`   Status: ${ready}, Restarts: ${numberField(status, 'restartCount') ?? 0}`];

  const running = field(status, 'state', 'running');
  const waiting = field(status, 'state', 'waiting');
  const terminated = field(status, 'state', 'terminated');
  if (running) {
    lines.push(`   Started At: ${stringField(running, 'startedAt')}`);
  } else if (waiting) {
    lines.push(`   Waiting: ${stringField(waiting, 'reason')} - ${stringField(waiting, 'message')}`);
  } else if (terminated) {
    lines.push(
      `   Terminated: ${stringField(terminated, 'reason')} - ${stringField(terminated, 'message')} (Exit Code: ${
        numberField(terminated, 'exitCode') ?? 0
      })`,
    );
  }
  return lines;
}

export function formatPod(pod: KubeDocument): string {
  const lines = [
    `Pod: ${stringField(pod, 'metadata', 'name')}`,
    `Namespace: ${stringField(pod, 'metadata', 'namespace')}`,
    `Status: ${stringField(pod, 'status', 'phase')}`,
    `Node: ${stringField(pod, 'spec', 'nodeName')}`,
    `IP: ${stringField(pod, 'status', 'podIP')}`,
    `Created: ${stringField(pod, 'metadata', 'creationTimestamp')}`,
    '',
    'Containers:',
  ];

  const statuses = arrayField(pod, 'status', 'containerStatuses');
  arrayField(pod, 'spec', 'containers').forEach((container, index) => {
    const name = stringField(container, 'name');
    lines.push(`${index + 1}. ${name} (Image: ${stringField(container, 'image')})`);
    const status = statuses.find((entry) => stringField(entry, 'name') === name);
    if (status) {
      lines.push(...containerStatusLines(status));
    }
  });

  const labels = labelLines(pod);
  if (labels.length > 0) {
    lines.push('', 'Labels:', ...labels);
  }
  return `${lines.join('\n')}\n`;
}

export function formatPodList(pods: KubeDocument[], options: PodListFormatOptions): string {
  const now = options.now ?? Date.now();
  const lines = pods.map((pod) => {
    const statuses = arrayField(pod, 'status', 'containerStatuses');
    const ready = statuses.filter((status) => field(status, 'ready') === true).length;
    const name = options.allNamespaces
      ? `${stringField(pod, 'metadata', 'namespace')}/${stringField(pod, 'metadata', 'name')}`
      : stringField(pod, 'metadata', 'name');

    let line = `• ${name}: ${stringField(pod, 'status', 'phase')} (${ready}/${statuses.length}) - IP: ${stringField(
      pod,
      'status',
      'podIP',
    )} - Age: ${ageOf(pod, now)}`;

    const node = stringField(pod, 'spec', 'nodeName');
    if (node) {
      line += ` - Node: ${node}`;
    }
    const restarts = statuses.reduce<number>((sum, status) => sum + (numberField(status, 'restartCount') ?? 0), 0);
    if (restarts > 0) {
      line += ` - Restarts: ${restarts}`;
    }
    return line;
  });

  let total = `Total: ${pods.length} pod(s)`;
  if (options.limit && options.limit > 0 && pods.length === options.limit) {
    total += ` (limited to ${options.limit} results)`;
  }
  return [...lines, '', total].join('\n');
}

export function formatDeploymentList(deployments: KubeDocument[], now: number = Date.now()): string {
  return deployments
    .map(
      (deployment) =>
        `• ${stringField(deployment, 'metadata', 'namespace')}/${stringField(deployment, 'metadata', 'name')}: ${
          numberField(deployment, 'status', 'readyReplicas') ?? 0
        }/${numberField(deployment, 'status', 'replicas') ?? 0} replicas ready - Age: ${ageOf(deployment, now)}`,
    )
    .join('\n');
}

/**
 * Full resource document as YAML, without server-managed field noise
 */
export function formatResource(document: KubeDocument): string {
  const metadata = field(document, 'metadata');
  const trimmed: KubeDocument = isRecord(metadata)
    ? { ...document, metadata: { ...metadata, managedFields: undefined } }
    : document;
  return yaml.dump(trimmed, { skipInvalid: true, noRefs: true, lineWidth: -1 });
}

export function formatResourceList(kind: string, items: KubeDocument[], now: number = Date.now()): string {
  const lines = items.map((item) => {
    const namespace = stringField(item, 'metadata', 'namespace');
    const name = stringField(item, 'metadata', 'name');
    return `• ${namespace ? `${namespace}/` : ''}${name} - Age: ${ageOf(item, now)}`;
  });
  return [...lines, '', `Total: ${items.length} ${kind}`].join('\n');
}
