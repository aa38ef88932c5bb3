import { DescriptorStore, toManifest } from '../descriptors/descriptor-store';
import { DependencyGraph } from '../orchestration/dependency-graph';
import {
  KubernetesManifest,
  Phase,
  PlatformPlan,
  PlatformSettings,
  ReadinessCheck,
  ResourceDescriptor,
  RetryPolicy,
  SecretBinding,
  SecretsBootstrapSpec,
  SecretsConsumer
} from '../types';
import { ResourceNamingService, createNamingService } from './naming';
import {
  DefaultsSection,
  HealthCheckConfig,
  PhaseConfig,
  PlatformConfig,
  ResourceEntry,
  ResourceFileEntry,
  SecretsConfig
} from './types';

const isFileEntry = (entry: ResourceFileEntry | KubernetesManifest): entry is ResourceFileEntry =>
  typeof entry.path === 'string' && !('kind' in entry);

const seconds = (value: number) => value * 1000;

/**
 * Turn a validated configuration into the immutable plan the orchestrator
 * runs: manifests are read and stamped, checks resolved, and the phase graph
 * checked for dangling dependencies and cycles.
 *
 * @throws ConfigurationError with every problem found
 */
export async function compilePlan(
  config: PlatformConfig,
  baseDir: string,
  naming: ResourceNamingService = createNamingService()
): Promise<PlatformPlan> {
  const platform: PlatformSettings = {
    name: config.platform.name,
    context: config.platform.context,
    namespace: config.platform.namespace,
    pollIntervalMs: seconds(config.platform.pollIntervalSeconds),
    reconcileIntervalMs: seconds(config.platform.reconcileIntervalSeconds),
    concurrency: config.platform.concurrency,
    conflictGraceMs: seconds(config.platform.conflictGraceSeconds),
    deleteGraceMs: seconds(config.platform.deleteGraceSeconds)
  };
  const store = new DescriptorStore(platform.namespace, naming);
  const phases: Phase[] = [];

  if (config.secrets) {
    phases.push(compileSecretsPhase(config.secrets, config.defaults, store));
  }
  for (const phaseConfig of config.phases) {
    phases.push(await compilePhase(phaseConfig, config.defaults, platform, baseDir, store, naming));
  }

  store.assertValid();
  DependencyGraph.build(phases);

  return { platform, phases, secretsAddress: config.secrets?.address };
}

function retryPolicyFor(defaults: DefaultsSection, override?: Partial<RetryPolicy>): RetryPolicy {
  return { ...defaults.retryPolicy, ...override };
}

async function compilePhase(
  phaseConfig: PhaseConfig,
  defaults: DefaultsSection,
  platform: PlatformSettings,
  baseDir: string,
  store: DescriptorStore,
  naming: ResourceNamingService
): Promise<Phase> {
  const timeoutMs = seconds(phaseConfig.timeoutSeconds ?? defaults.timeoutSeconds);
  const resources: ResourceDescriptor[] = [];
  const register = (manifest: KubernetesManifest, required: boolean) => {
    const descriptor = store.register(phaseConfig.name, manifest, required);
    if (descriptor) {
      resources.push(descriptor);
    }
  };

  for (const entry of phaseConfig.resources) {
    for (const { manifest, required } of await resolveEntry(phaseConfig.name, entry, baseDir, store)) {
      register(manifest, required);
    }
  }

  const healthChecks = phaseConfig.healthChecks.flatMap((check, index) => {
    const resolved = resolveCheck(check, timeoutMs, platform, naming);
    if (typeof resolved === 'string') {
      store.addIssue({ location: `${phaseConfig.name}.healthChecks[${index}]`, message: resolved });
      return [];
    }
    return [resolved];
  });

  const gitops = phaseConfig.gitops
    ? {
      name: phaseConfig.gitops.name ?? naming.kustomizationName(phaseConfig.name),
      namespace: phaseConfig.gitops.namespace,
      sourceRef: phaseConfig.gitops.sourceRef,
      path: phaseConfig.gitops.path,
      interval: phaseConfig.gitops.interval,
      prune: phaseConfig.gitops.prune,
      targetNamespace: phaseConfig.gitops.targetNamespace,
      required: phaseConfig.gitops.required
    }
    : undefined;
  if (gitops) {
    const registration = store.gitops(gitops, timeoutMs);
    register(registration.manifest, true);
    healthChecks.push(registration.check);
  }

  return {
    name: phaseConfig.name,
    resources,
    dependsOn: phaseConfig.dependsOn,
    healthChecks,
    timeoutMs,
    retryPolicy: retryPolicyFor(defaults, phaseConfig.retryPolicy),
    optional: phaseConfig.optional,
    gitops
  };
}

async function resolveEntry(
  phaseName: string,
  entry: ResourceEntry,
  baseDir: string,
  store: DescriptorStore
): Promise<{ manifest: KubernetesManifest; required: boolean }[]> {
  if (typeof entry === 'string') {
    return (await store.loadFile(phaseName, entry, baseDir)).map(manifest => ({ manifest, required: true }));
  }
  if (isFileEntry(entry)) {
    const required = entry.required;
    return (await store.loadFile(phaseName, entry.path, baseDir)).map(manifest => ({ manifest, required }));
  }
  const manifest = toManifest(entry);
  if (typeof manifest === 'string') {
    store.addIssue({ location: `${phaseName}.resources`, message: `inline manifest: ${manifest}` });
    return [];
  }
  return [{ manifest, required: true }];
}

function resolveCheck(
  check: HealthCheckConfig,
  phaseTimeoutMs: number,
  platform: PlatformSettings,
  naming: ResourceNamingService
): ReadinessCheck | string {
  const apiVersion = check.apiVersion ?? naming.defaultApiVersion(check.kind);
  if (!apiVersion) {
    return `apiVersion is required for kind ${check.kind}`;
  }
  return {
    targetKind: check.kind,
    apiVersion,
    namespace: naming.isClusterScoped(check.kind) ? undefined : check.namespace ?? platform.namespace,
    selector: check.name ? { name: check.name } : { labels: check.labels },
    condition: check.condition,
    timeoutMs: check.timeoutSeconds ? seconds(check.timeoutSeconds) : phaseTimeoutMs,
    required: check.required
  };
}

function compileSecretsPhase(secrets: SecretsConfig, defaults: DefaultsSection, store: DescriptorStore): Phase {
  const timeoutMs = seconds(secrets.timeoutSeconds ?? defaults.timeoutSeconds);
  const consumers: SecretsConsumer[] = secrets.consumers.map(consumer => ({
    name: consumer.name,
    serviceAccount: consumer.serviceAccount,
    namespace: consumer.namespace,
    access: consumer.access,
    mount: consumer.mount ?? consumer.name
  }));

  const bindings: SecretBinding[] = [];
  secrets.bindings.forEach((binding, index) => {
    const consumer = consumers.find(item => item.name === binding.consumer);
    if (!consumer) {
      store.addIssue({
        location: `secrets.bindings[${index}].consumer`,
        message: `unknown consumer "${binding.consumer}"`
      });
      return;
    }
    bindings.push({
      consumerIdentity: consumer.name,
      mount: consumer.mount,
      secretPath: binding.secretPath,
      destination: {
        name: binding.destination.name,
        namespace: binding.destination.namespace ?? consumer.namespace
      },
      refreshInterval: binding.refreshInterval,
      seed: binding.seed
    });
  });

  const spec: SecretsBootstrapSpec = {
    authPath: secrets.auth.path,
    kubernetesHost: secrets.auth.kubernetesHost,
    audience: secrets.auth.audience,
    consumers,
    bindings
  };

  const { manifests, checks } = store.secrets(spec, timeoutMs);
  const resources = manifests.flatMap(manifest => store.register(secrets.phase, manifest, true) ?? []);

  return {
    name: secrets.phase,
    resources,
    dependsOn: secrets.dependsOn,
    healthChecks: checks,
    timeoutMs,
    retryPolicy: retryPolicyFor(defaults, secrets.retryPolicy),
    optional: false,
    secrets: spec
  };
}
