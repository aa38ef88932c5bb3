import * as k8s from '@kubernetes/client-node';
import { ConfigurationIssue, PreflightError, errorMessage } from '../errors';
import { PlatformPlan } from '../types';

export interface SecretsEngineCredentials {
  address: string;
  token: string;
  namespace?: string;
}

export interface PlatformEnvironment {
  kubeConfig: k8s.KubeConfig;
  /** Present when the plan has a secrets phase */
  secrets?: SecretsEngineCredentials;
}

export interface PreflightOptions {
  env?: NodeJS.ProcessEnv;
  /** Loads KUBECONFIG, ~/.kube/config or the in-cluster account by default */
  loadKubeConfig?: () => k8s.KubeConfig;
}

function loadDefaultKubeConfig(): k8s.KubeConfig {
  const kubeConfig = new k8s.KubeConfig();
  kubeConfig.loadFromDefault();
  return kubeConfig;
}

/**
 * Resolve platform and secrets engine credentials before anything runs
 * @throws PreflightError naming every missing credential
 */
export function preflight(plan: PlatformPlan, options: PreflightOptions = {}): PlatformEnvironment {
  const env = options.env ?? process.env;
  const issues: ConfigurationIssue[] = [];
  let kubeConfig: k8s.KubeConfig | undefined;

  try {
    kubeConfig = (options.loadKubeConfig ?? loadDefaultKubeConfig)();
  } catch (error) {
    issues.push({ location: 'KUBECONFIG', message: `cannot load kubeconfig: ${errorMessage(error)}` });
  }

  if (kubeConfig) {
    const context = plan.platform.context;
    if (context) {
      if (kubeConfig.getContextObject(context)) {
        kubeConfig.setCurrentContext(context);
      } else {
        issues.push({ location: 'platform.context', message: `context "${context}" not found in kubeconfig` });
      }
    } else if (!kubeConfig.getCurrentCluster()) {
      issues.push({ location: 'KUBECONFIG', message: 'kubeconfig has no current context; set KUBECONFIG or platform.context' });
    }
  }

  let secrets: SecretsEngineCredentials | undefined;
  if (plan.phases.some(phase => phase.secrets)) {
    const address = env.VAULT_ADDR ?? plan.secretsAddress;
    const token = env.VAULT_TOKEN;
    if (!address) {
      issues.push({ location: 'VAULT_ADDR', message: 'secrets engine address is required (VAULT_ADDR or secrets.address)' });
    }
    if (!token) {
      issues.push({ location: 'VAULT_TOKEN', message: 'secrets engine token is required' });
    }
    if (address && token) {
      secrets = { address, token, ...(env.VAULT_NAMESPACE ? { namespace: env.VAULT_NAMESPACE } : {}) };
    }
  }

  if (issues.length > 0 || !kubeConfig) {
    throw new PreflightError(issues);
  }
  return { kubeConfig, secrets };
}
