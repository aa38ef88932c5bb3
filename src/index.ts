// Main entry point for the platform orchestrator
export * from './types';
export * from './errors';
export * from './logging/logger';
export * from './config/naming';
export * from './config/types';
export { PlatformConfigLoader, createConfigLoader, loadPlan, DEFAULT_CONFIG_PATHS } from './config/loader';
export { validateConfig, validateAndNormalizeConfig } from './config/validator';
export { compilePlan } from './config/plan';
export { preflight } from './config/environment';
export type { PlatformEnvironment, PreflightOptions, SecretsEngineCredentials } from './config/environment';
export { DescriptorStore, toManifest } from './descriptors/descriptor-store';
export * from './provisioning/types';
export { KubernetesManager } from './provisioning/kubernetes-manager';
export { VaultManager } from './provisioning/vault-manager';
export * from './orchestration/types';
export { DependencyGraph } from './orchestration/dependency-graph';
export type { GraphNode } from './orchestration/dependency-graph';
export { RetryController, DEFAULT_RETRY_POLICY } from './orchestration/retry-controller';
export { ReadinessGate, DEFAULT_POLL_INTERVAL_MS } from './orchestration/readiness-gate';
export { PhaseExecutor } from './orchestration/phase-executor';
export type { ApplyContext, ApplyResult, ExecutorOptions } from './orchestration/phase-executor';
export { SecretsBootstrapCoordinator, buildPolicy } from './orchestration/secrets-bootstrap';
export type { SecretsBootstrapState, SecretsInspection } from './orchestration/secrets-bootstrap';
export { ConvergenceReconciler } from './orchestration/convergence-reconciler';
export { TeardownController } from './orchestration/teardown-controller';
export { DeploymentOrchestrator } from './orchestration/deployment-orchestrator';
export type { OrchestratorDependencies } from './orchestration/deployment-orchestrator';
export { structuralDiff } from './orchestration/structural-diff';
