import { describe, test, expect, beforeEach } from '@jest/globals';
import type { FakeCluster } from '../../__support__/fake-cluster';
import {
  createConnectedManager,
  createToolRunner,
  expectOk,
  type ToolRunner,
} from '../../__support__/test-helpers';

describe('pod tools', () => {
  let cluster: FakeCluster;
  let run: ToolRunner;

  beforeEach(async () => {
    const setup = await createConnectedManager('test');
    cluster = setup.cluster;
    run = createToolRunner(setup.manager);
    cluster.addPod({ name: 'web' });
    cluster.addPod({ name: 'dns', namespace: 'kube-system' });
  });

  test('list_pods lists the current namespace', async () => {
    const lines = expectOk(await run('list_pods')).split('\n');

    expect(lines[0]).toBe("Pods in namespace 'default':");
    expect(lines[1]).toMatch(/^• web: Running \(1\/1\) - IP: 10\.0\.0\.1 - Age: \d+d$/);
    expect(lines.slice(2)).toEqual(['', 'Total: 1 pod(s)']);
  });

  test('list_pods lists across all namespaces', async () => {
    const lines = expectOk(await run('list_pods', { allNamespaces: true, limit: 2 })).split('\n');

    expect(lines[0]).toBe('Pods across all namespaces:');
    expect(lines[1]).toMatch(/^• default\/web: /);
    expect(lines[2]).toMatch(/^• kube-system\/dns: /);
    expect(lines[4]).toBe('Total: 2 pod(s) (limited to 2 results)');
  });

  test('list_pods reports an empty namespace as a failure', async () => {
    cluster.namespaces.add('empty');

    await expect(run('list_pods', { namespace: 'empty' })).resolves.toEqual({ ok: false, error: 'no pods found' });
  });

  test('get_pod prints the pod', async () => {
    const text = expectOk(await run('get_pod', { name: 'dns', namespace: 'kube-system' }));

    expect(text.startsWith('Pod: dns\nNamespace: kube-system\nStatus: Running\n')).toBe(true);
  });

  test('delete_pod forwards force', async () => {
    await expect(run('delete_pod', { name: 'web', force: true })).resolves.toEqual({
      ok: true,
      value: 'Pod "web" deleted successfully from namespace "default"',
    });
    expect(cluster.deleted).toEqual([{ name: 'web', namespace: 'default', gracePeriodSeconds: 0 }]);
  });

  test('stream_logs returns the header and logs', async () => {
    cluster.setLogs('default', 'web', 'app', 'hello\n');

    await expect(run('stream_logs', { pod: 'web', tail: 5 })).resolves.toEqual({
      ok: true,
      value: "Logs from container 'app' in pod 'default/web' (tail=5):\n\nhello\n",
    });
  });

  test('stream_logs validates tail', async () => {
    await expect(run('stream_logs', { pod: 'web', tail: -1 })).resolves.toEqual({
      ok: false,
      error: 'Invalid parameters: tail: Number must be greater than or equal to 0',
    });
  });
});
