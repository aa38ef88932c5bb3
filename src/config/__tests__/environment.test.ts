import { describe, it, expect } from 'vitest';
import { KubeConfig } from '@kubernetes/client-node';
import { preflight } from '../environment';
import { PreflightError } from '../../errors';
import { makePhase, makeSecretsPhase, testSettings } from '../../testing/fixtures';
import { PlatformPlan } from '../../types';

function kubeConfig(currentContext = 'dev'): KubeConfig {
  const config = new KubeConfig();
  config.loadFromOptions({
    clusters: [
      { name: 'dev-cluster', server: 'https://dev.k8s.test', skipTLSVerify: true },
      { name: 'staging-cluster', server: 'https://staging.k8s.test', skipTLSVerify: true }
    ],
    users: [{ name: 'ci', token: 'test-token' }],
    contexts: [
      { name: 'dev', cluster: 'dev-cluster', user: 'ci' },
      { name: 'staging', cluster: 'staging-cluster', user: 'ci' }
    ],
    currentContext
  });
  return config;
}

const plainPlan = (context?: string): PlatformPlan => ({
  platform: testSettings({ context }),
  phases: [makePhase('base')]
});

const secretsPlan = (secretsAddress?: string): PlatformPlan => ({
  platform: testSettings(),
  phases: [makeSecretsPhase(), makePhase('base', { dependsOn: ['secrets'] })],
  secretsAddress
});

function preflightError(run: () => unknown): PreflightError | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof PreflightError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('preflight', () => {
  it('should use the current context when none is configured', () => {
    const environment = preflight(plainPlan(), { env: {}, loadKubeConfig: () => kubeConfig() });

    expect(environment.kubeConfig.getCurrentCluster()?.server).toBe('https://dev.k8s.test');
    expect(environment.secrets).toBeUndefined();
  });

  it('should switch to the configured context', () => {
    const environment = preflight(plainPlan('staging'), { env: {}, loadKubeConfig: () => kubeConfig() });

    expect(environment.kubeConfig.getCurrentContext()).toBe('staging');
    expect(environment.kubeConfig.getCurrentCluster()?.server).toBe('https://staging.k8s.test');
  });

  it('should reject an unknown context', () => {
    const error = preflightError(() => preflight(plainPlan('prod'), { env: {}, loadKubeConfig: () => kubeConfig() }));

    expect(error?.issues).toEqual([{ location: 'platform.context', message: 'context "prod" not found in kubeconfig' }]);
  });

  it('should report a kubeconfig that cannot be loaded', () => {
    const error = preflightError(() => preflight(plainPlan(), {
      env: {},
      loadKubeConfig: () => {
        throw new Error('ENOENT: no such file');
      }
    }));

    expect(error?.issues).toEqual([{ location: 'KUBECONFIG', message: 'cannot load kubeconfig: ENOENT: no such file' }]);
  });

  it('should resolve secrets engine credentials from the environment', () => {
    const environment = preflight(secretsPlan('https://vault.config.test'), {
      env: { VAULT_ADDR: 'https://vault.env.test', VAULT_TOKEN: 'test-token', VAULT_NAMESPACE: 'team-a' },
      loadKubeConfig: () => kubeConfig()
    });

    expect(environment.secrets).toEqual({ address: 'https://vault.env.test', token: 'test-token', namespace: 'team-a' });
  });

  it('should fall back to the configured secrets engine address', () => {
    const environment = preflight(secretsPlan('https://vault.config.test'), {
      env: { VAULT_TOKEN: 'test-token' },
      loadKubeConfig: () => kubeConfig()
    });

    expect(environment.secrets).toEqual({ address: 'https://vault.config.test', token: 'test-token' });
  });

  it('should name every missing secrets engine credential', () => {
    const error = preflightError(() => preflight(secretsPlan(), { env: {}, loadKubeConfig: () => kubeConfig() }));

    expect(error?.issues.map(issue => issue.location)).toEqual(['VAULT_ADDR', 'VAULT_TOKEN']);
  });
});
