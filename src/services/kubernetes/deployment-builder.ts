/**
 * Deployment builder
 *
 * Turns loosely-typed deployment parameters into a checked specification,
 * then into an `apps/v1` Deployment document.
 */

import { ValidationError } from '../../errors/index';
import type {
  DeploymentParams,
  ImagePullPolicy,
  KubeDocument,
  PortProtocol,
} from '../../domain/types';

const PULL_POLICIES: readonly ImagePullPolicy[] = ['Always', 'IfNotPresent', 'Never'];
const PROTOCOLS: readonly PortProtocol[] = ['TCP', 'UDP', 'SCTP'];

export interface ContainerPortSpec {
  containerPort: number;
  protocol?: PortProtocol;
}

export interface EnvVar {
  name: string;
  value: string;
}

export interface DeploymentSpecification {
  name: string;
  namespace: string;
  image: string;
  replicas: number;
  labels: Record<string, string>;
  port?: ContainerPortSpec;
  env: EnvVar[];
  imagePullPolicy?: ImagePullPolicy;
  imagePullSecrets: string[];
}

/**
 * Parse `port[/protocol]`. The port is the leading integer; the protocol is
 * kept only when it is one the API accepts.
 */
export function parseContainerPort(value: string): ContainerPortSpec | undefined {
  const [portPart = '', protocolPart] = value.split('/');
  const digits = /^\s*(\d+)/.exec(portPart)?.[1];
  if (!digits) {
    return undefined;
  }
  const spec: ContainerPortSpec = { containerPort: parseInt(digits, 10) };
  const protocol = PROTOCOLS.find((candidate) => candidate === protocolPart);
  if (protocol) {
    spec.protocol = protocol;
  }
  return spec;
}

export function buildDeployment(params: DeploymentParams): DeploymentSpecification {
  const invalid: string[] = [];
  if (params.name.trim() === '') invalid.push('name');
  if (params.image.trim() === '') invalid.push('image');
  if (!Number.isInteger(params.replicas) || params.replicas < 0) invalid.push('replicas');
  if (invalid.length > 0) {
    throw new ValidationError(`invalid deployment parameters: ${invalid.join(', ')}`, invalid);
  }

  const env = Object.entries(params.env ?? {}).flatMap(([name, value]) =>
    typeof value === 'string' ? [{ name, value }] : [],
  );

  const imagePullSecrets = (params.imagePullSecrets ?? []).filter(
    (secret): secret is string => typeof secret === 'string' && secret !== '',
  );

  return {
    name: params.name,
    namespace: params.namespace,
    image: params.image,
    replicas: params.replicas,
    labels: { app: params.name, ...params.labels },
    port: params.containerPort ? parseContainerPort(params.containerPort) : undefined,
    env,
    imagePullPolicy: PULL_POLICIES.find((policy) => policy === params.imagePullPolicy),
    imagePullSecrets,
  };
}

export function toDeploymentDocument(spec: DeploymentSpecification): KubeDocument {
  const container: KubeDocument = {
    name: spec.name,
    image: spec.image,
  };
  if (spec.port) {
    container.ports = [{ ...spec.port }];
  }
  if (spec.env.length > 0) {
    container.env = spec.env.map((entry) => ({ ...entry }));
  }
  if (spec.imagePullPolicy) {
    container.imagePullPolicy = spec.imagePullPolicy;
  }

  const podSpec: KubeDocument = { containers: [container] };
  if (spec.imagePullSecrets.length > 0) {
    podSpec.imagePullSecrets = spec.imagePullSecrets.map((name) => ({ name }));
  }

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: spec.name,
      namespace: spec.namespace,
      labels: { ...spec.labels },
    },
    spec: {
      replicas: spec.replicas,
      selector: { matchLabels: { ...spec.labels } },
      template: {
        metadata: { labels: { ...spec.labels } },
        spec: podSpec,
      },
    },
  };
}
