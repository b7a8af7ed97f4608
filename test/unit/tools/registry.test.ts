import { describe, test, expect } from '@jest/globals';
import { createToolRegistry } from '../../../src/tools/index';
import { createTestManager, createToolRunner } from '../../__support__/test-helpers';

describe('createToolRegistry', () => {
  test('binds every cluster tool', () => {
    const tools = createToolRegistry(createTestManager().manager);

    expect(tools.map((tool) => tool.name)).toEqual([
      'list_contexts',
      'get_current_context',
      'switch_context',
      'load_kubeconfig',
      'delete_context',
      'rename_context',
      'describe_context',
      'set_namespace',
      'list_pods',
      'get_pod',
      'delete_pod',
      'stream_logs',
      'list_deployments',
      'create_deployment',
      'get_resource',
      'list_resources',
      'create_resource',
      'delete_resource',
    ]);
  });

  test('publishes an object JSON schema with descriptions', () => {
    const tools = createToolRegistry(createTestManager().manager);
    const getPod = tools.find((tool) => tool.name === 'get_pod');

    for (const tool of tools) {
      expect(tool.description).toBeTruthy();
      expect(tool.schema?.type).toBe('object');
    }
    expect(getPod?.schema?.required).toEqual(['name']);
    expect(getPod?.schema?.properties).toMatchObject({
      name: { type: 'string', minLength: 1, description: 'Name of the pod' },
    });
  });

  test('returns a failure for invalid parameters', async () => {
    const run = createToolRunner(createTestManager().manager);

    await expect(run('get_pod', {})).resolves.toEqual({ ok: false, error: 'Invalid parameters: name: Required' });
    await expect(run('get_pod', { name: '' })).resolves.toEqual({
      ok: false,
      error: 'Invalid parameters: name: must be a non-empty string',
    });
  });

  test('returns a failure carrying the error message', async () => {
    const run = createToolRunner(createTestManager().manager);

    await expect(run('get_pod', { name: 'web' })).resolves.toEqual({
      ok: false,
      error: 'no clusters configured - use the load_kubeconfig tool first',
    });
  });
});
