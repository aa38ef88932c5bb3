import { describe, it, expect, beforeEach } from 'vitest';
import { ReadinessGate } from '../readiness-gate';
import { CancelledError, PlatformError } from '../../errors';
import { InMemoryPlatform } from '../../testing/in-memory-platform';
import { availableCheck, deployment } from '../../testing/fixtures';
import { KubernetesManifest } from '../../types';

const availableDeployment = (name: string): KubernetesManifest => ({
  ...deployment(name),
  status: { conditions: [{ type: 'Available', status: 'True' }] }
});

describe('ReadinessGate', () => {
  let platform: InMemoryPlatform;
  let gate: ReadinessGate;

  beforeEach(() => {
    platform = new InMemoryPlatform();
    gate = new ReadinessGate(platform);
  });

  it('should skip when there is nothing to check', async () => {
    const result = await gate.waitFor([], 1000);

    expect(result).toEqual({ outcome: 'Skipped', checks: [] });
    expect(platform.calls).toEqual([]);
  });

  it('should be ready when every check passes on the first poll', async () => {
    platform.seed(availableDeployment('api'));

    const result = await gate.waitFor([availableCheck('api')], 1000, { pollIntervalMs: 5 });

    expect(result.outcome).toBe('Ready');
    expect(result.checks).toHaveLength(1);
    expect(result.checks[0].state).toBe('Ready');
    expect(result.checks[0].target).toBe('Deployment/apps/api');
  });

  it('should keep polling until the object becomes ready', async () => {
    platform.seed(deployment('api'));
    let polls = 0;
    const original = platform.get.bind(platform);
    platform.get = async ref => {
      polls++;
      if (polls === 3) {
        platform.patchStored(ref, { status: { conditions: [{ type: 'Available', status: 'True' }] } });
      }
      return original(ref);
    };

    const result = await gate.waitFor([availableCheck('api')], 1000, { pollIntervalMs: 2 });

    expect(result.outcome).toBe('Ready');
    expect(polls).toBe(3);
  });

  it('should time out a required check and skip the ones still pending', async () => {
    const result = await gate.waitFor(
      [availableCheck('missing', { timeoutMs: 20 }), availableCheck('slow', { timeoutMs: 1000 })],
      1000,
      { pollIntervalMs: 5 }
    );

    expect(result.outcome).toBe('TimedOut');
    expect(result.checks.map(check => check.state)).toEqual(['TimedOut', 'Skipped']);
    expect(result.checks[0].reason).toBe('not found');
    expect(result.checks[1].reason).toBe('abandoned after a required check failed: not found');
  });

  it('should only warn when an optional check times out', async () => {
    platform.seed(availableDeployment('api'));

    const result = await gate.waitFor(
      [availableCheck('api'), availableCheck('extra', { timeoutMs: 15, required: false })],
      1000,
      { pollIntervalMs: 5 }
    );

    expect(result.outcome).toBe('Ready');
    expect(result.checks.map(check => check.state)).toEqual(['Ready', 'TimedOut']);
  });

  it('should cap every check by the overall timeout', async () => {
    const started = Date.now();

    const result = await gate.waitFor([availableCheck('missing', { timeoutMs: 60000 })], 20, { pollIntervalMs: 5 });

    expect(result.outcome).toBe('TimedOut');
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should treat lookup errors as not ready', async () => {
    platform.failNext('get', new PlatformError('transient', 'connection reset'));

    const result = await gate.evaluate(availableCheck('api'));

    expect(result).toEqual({ ready: false, reason: 'lookup failed: connection reset' });
  });

  it('should resolve label selectors through list', async () => {
    platform.seed({ ...availableDeployment('web'), metadata: { name: 'web', namespace: 'apps', labels: { tier: 'web' } } });
    platform.seed({ ...availableDeployment('worker'), metadata: { name: 'worker', namespace: 'apps', labels: { tier: 'jobs' } } });

    const result = await gate.evaluate(availableCheck('unused', { selector: { labels: { tier: 'web' } } }));

    expect(result).toEqual({ ready: true, reason: 'Available=True' });
    expect(platform.calls).toEqual([{ operation: 'list', target: 'apps/v1/Deployment' }]);
  });

  it('should stop when the signal aborts', async () => {
    const abort = new AbortController();
    setTimeout(() => abort.abort(), 10);

    await expect(
      gate.waitFor([availableCheck('missing', { timeoutMs: 5000 })], 5000, { pollIntervalMs: 5, signal: abort.signal })
    ).rejects.toBeInstanceOf(CancelledError);
  });
});
