import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TeardownController } from '../teardown-controller';
import { DependencyGraph } from '../dependency-graph';
import { RetryController } from '../retry-controller';
import { createNamingService } from '../../config/naming';
import { CancelledError, PlatformError } from '../../errors';
import { InMemoryPlatform } from '../../testing/in-memory-platform';
import { configMap, deployment, makePhase } from '../../testing/fixtures';

describe('TeardownController', () => {
  let platform: InMemoryPlatform;
  let controller: TeardownController;

  const graph = () => DependencyGraph.build([
    makePhase('app', { manifests: [configMap('app-settings'), deployment('app')], dependsOn: ['db'] }),
    makePhase('db', { manifests: [deployment('db')] })
  ]);

  beforeEach(() => {
    platform = new InMemoryPlatform();
    controller = new TeardownController(platform, new RetryController(), createNamingService());
    platform.seed(configMap('app-settings'));
    platform.seed(deployment('app'));
    platform.seed(deployment('db'));
  });

  it('should delete dependents before their dependencies, each phase in reverse', async () => {
    const result = await controller.teardown(graph(), { deleteGraceMs: 0 });

    expect(result.order).toEqual(['app', 'db']);
    expect(result.deleted).toEqual([
      'apps/v1/Deployment/apps/app',
      'v1/ConfigMap/apps/app-settings',
      'apps/v1/Deployment/apps/db'
    ]);
    expect(result.absent).toEqual([]);
    expect(platform.size).toBe(0);
  });

  it('should report already absent resources on a second run', async () => {
    await controller.teardown(graph(), { deleteGraceMs: 0 });

    const second = await controller.teardown(graph(), { deleteGraceMs: 0 });

    expect(second.deleted).toEqual([]);
    expect(second.absent).toHaveLength(3);
    expect(second.failed).toEqual([]);
  });

  it('should continue past a resource that cannot be deleted', async () => {
    platform.failNext('delete', new PlatformError('fatal', 'forbidden', { statusCode: 403 }), {
      target: 'v1/ConfigMap/apps/app-settings'
    });

    const result = await controller.teardown(graph(), { deleteGraceMs: 0 });

    expect(result.failed).toEqual([{ identity: 'v1/ConfigMap/apps/app-settings', phase: 'app', error: 'forbidden' }]);
    expect(result.deleted).toEqual(['apps/v1/Deployment/apps/app', 'apps/v1/Deployment/apps/db']);
  });

  it('should pass the grace period in whole seconds', async () => {
    const remove = vi.spyOn(platform, 'delete');

    await controller.teardown(graph(), { deleteGraceMs: 1500 });

    expect(remove).toHaveBeenCalledWith(
      { apiVersion: 'apps/v1', kind: 'Deployment', name: 'app', namespace: 'apps' },
      { gracePeriodSeconds: 2 }
    );
  });

  it('should stop when cancelled', async () => {
    const abort = new AbortController();
    abort.abort();

    await expect(controller.teardown(graph(), { deleteGraceMs: 0, signal: abort.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(platform.size).toBe(3);
  });
});
