import { describe, test, expect } from '@jest/globals';
import {
  buildDeployment,
  parseContainerPort,
  toDeploymentDocument,
} from '../../../../src/services/kubernetes/deployment-builder';
import { ValidationError } from '../../../../src/errors/index';
import type { DeploymentParams } from '../../../../src/domain/types';

const base: DeploymentParams = {
  name: 'web',
  image: 'nginx:1.25',
  namespace: 'default',
  replicas: 2,
};

describe('parseContainerPort', () => {
  test.each([
    ['8080', { containerPort: 8080 }],
    ['80/TCP', { containerPort: 80, protocol: 'TCP' }],
    ['53/UDP', { containerPort: 53, protocol: 'UDP' }],
    ['9000/SCTP', { containerPort: 9000, protocol: 'SCTP' }],
    ['80/HTTP', { containerPort: 80 }],
    ['80/tcp', { containerPort: 80 }],
    ['8080abc', { containerPort: 8080 }],
  ])('parses %s', (input, expected) => {
    expect(parseContainerPort(input)).toEqual(expected);
  });

  test.each(['http', '', '/TCP'])('rejects %p', (input) => {
    expect(parseContainerPort(input)).toBeUndefined();
  });
});

describe('buildDeployment', () => {
  test('adds the app label ahead of caller labels', () => {
    const spec = buildDeployment({ ...base, labels: { tier: 'frontend', app: 'custom' } });

    expect(spec.labels).toEqual({ app: 'custom', tier: 'frontend' });
  });

  test('keeps only string environment values', () => {
    const spec = buildDeployment({ ...base, env: { MODE: 'prod', PORT: 8080, DEBUG: true, EMPTY: '' } });

    expect(spec.env).toEqual([
      { name: 'MODE', value: 'prod' },
      { name: 'EMPTY', value: '' },
    ]);
  });

  test('drops an unknown pull policy', () => {
    expect(buildDeployment({ ...base, imagePullPolicy: 'Sometimes' }).imagePullPolicy).toBeUndefined();
    expect(buildDeployment({ ...base, imagePullPolicy: 'IfNotPresent' }).imagePullPolicy).toBe('IfNotPresent');
  });

  test('keeps non-empty string pull secrets only', () => {
    const spec = buildDeployment({ ...base, imagePullSecrets: ['regcred', '', 42, null, 'backup'] });

    expect(spec.imagePullSecrets).toEqual(['regcred', 'backup']);
  });

  test('accepts zero replicas', () => {
    expect(buildDeployment({ ...base, replicas: 0 }).replicas).toBe(0);
  });

  test('names every invalid field', () => {
    expect(() => buildDeployment({ ...base, name: '', image: ' ', replicas: -1 })).toThrow(
      new ValidationError('invalid deployment parameters: name, image, replicas'),
    );
  });
});

describe('toDeploymentDocument', () => {
  test('emits a minimal deployment', () => {
    expect(toDeploymentDocument(buildDeployment(base))).toEqual({
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      metadata: { name: 'web', namespace: 'default', labels: { app: 'web' } },
      spec: {
        replicas: 2,
        selector: { matchLabels: { app: 'web' } },
        template: {
          metadata: { labels: { app: 'web' } },
          spec: { containers: [{ name: 'web', image: 'nginx:1.25' }] },
        },
      },
    });
  });

  test('emits ports, env, pull policy and pull secrets when present', () => {
    const document = toDeploymentDocument(
      buildDeployment({
        ...base,
        containerPort: '8080/TCP',
        env: { MODE: 'prod' },
        imagePullPolicy: 'Always',
        imagePullSecrets: ['regcred'],
      }),
    );

    expect(document.spec).toMatchObject({
      template: {
        spec: {
          containers: [
            {
              name: 'web',
              image: 'nginx:1.25',
              ports: [{ containerPort: 8080, protocol: 'TCP' }],
              env: [{ name: 'MODE', value: 'prod' }],
              imagePullPolicy: 'Always',
            },
          ],
          imagePullSecrets: [{ name: 'regcred' }],
        },
      },
    });
  });

  test('leaves out ports for an unparsable container port', () => {
    const document = toDeploymentDocument(buildDeployment({ ...base, containerPort: 'http' }));

    expect(document.spec).toMatchObject({
      template: { spec: { containers: [{ name: 'web', image: 'nginx:1.25' }] } },
    });
    expect(JSON.stringify(document)).not.toContain('ports');
  });
});
