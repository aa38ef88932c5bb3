import { describe, it, expect, beforeEach } from 'vitest';
import { ConvergenceReconciler } from '../convergence-reconciler';
import { DependencyGraph } from '../dependency-graph';
import { PhaseExecutor } from '../phase-executor';
import { ReadinessGate } from '../readiness-gate';
import { RetryController } from '../retry-controller';
import { createNamingService } from '../../config/naming';
import { PlatformError } from '../../errors';
import { InMemoryPlatform } from '../../testing/in-memory-platform';
import { configMap, makePhase, testSettings } from '../../testing/fixtures';
import { ReconcileReport } from '../types';

const settingsRef = { apiVersion: 'v1', kind: 'ConfigMap', name: 'settings', namespace: 'apps' };

describe('ConvergenceReconciler', () => {
  let platform: InMemoryPlatform;
  let reconciler: ConvergenceReconciler;

  beforeEach(() => {
    platform = new InMemoryPlatform();
    const naming = createNamingService();
    const retry = new RetryController();
    const executor = new PhaseExecutor(platform, new ReadinessGate(platform), retry, naming);
    const graph = DependencyGraph.build([
      makePhase('config', { manifests: [configMap('settings', { mode: 'fast' }), configMap('flags')] })
    ]);
    reconciler = new ConvergenceReconciler(graph, testSettings(), platform, executor, naming);
    platform.seed(configMap('settings', { mode: 'fast' }));
    platform.seed(configMap('flags'));
  });

  it('should do nothing while the live state matches', async () => {
    const report = await reconciler.reconcile();

    expect(report.checked).toBe(2);
    expect(report.reapplied).toEqual([]);
    expect(report.failed).toEqual([]);
    expect(platform.mutations()).toEqual([]);
  });

  it('should reapply a drifted resource', async () => {
    platform.patchStored(settingsRef, { data: { mode: 'slow' } });

    const report = await reconciler.reconcile();

    expect(report.reapplied).toEqual(['v1/ConfigMap/apps/settings']);
    expect(platform.peek(settingsRef)?.data).toEqual({ mode: 'fast' });
  });

  it('should recreate a missing resource', async () => {
    await platform.delete({ apiVersion: 'v1', kind: 'ConfigMap', name: 'flags', namespace: 'apps' });

    const report = await reconciler.reconcile();

    expect(report.reapplied).toEqual(['v1/ConfigMap/apps/flags']);
    expect(platform.mutations().map(call => call.operation)).toEqual(['delete', 'create']);
  });

  it('should report failures without throwing', async () => {
    platform.patchStored(settingsRef, { data: { mode: 'slow' } });
    platform.failNext('update', new PlatformError('fatal', 'admission webhook denied the request', { statusCode: 400 }));

    const report = await reconciler.reconcile();

    expect(report.failed).toEqual([{
      identity: 'v1/ConfigMap/apps/settings',
      phase: 'config',
      error: 'admission webhook denied the request'
    }]);
  });

  it('should join a pass that is already running', async () => {
    const first = reconciler.reconcile();
    const second = reconciler.reconcile();

    expect(second).toBe(first);
    await first;
    expect(platform.calls.filter(call => call.operation === 'get')).toHaveLength(2);
  });

  it('should keep reconciling until the signal aborts', async () => {
    const abort = new AbortController();
    const reports: ReconcileReport[] = [];

    await reconciler.run(abort.signal, report => {
      reports.push(report);
      if (reports.length === 2) {
        abort.abort();
      }
    });

    expect(reports).toHaveLength(2);
  });
});
