import { KubernetesManifest, ReadinessCheck } from '../types';

export interface ConditionResult {
  ready: boolean;
  reason: string;
}

interface StatusCondition {
  type: string;
  status: string;
  message?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

const asNumber = (value: unknown, fallback: number): number =>
  typeof value === 'number' ? value : fallback;

function statusOf(object: KubernetesManifest): Record<string, unknown> {
  return isRecord(object.status) ? object.status : {};
}

function specOf(object: KubernetesManifest): Record<string, unknown> {
  return isRecord(object.spec) ? object.spec : {};
}

function conditionsOf(object: KubernetesManifest): StatusCondition[] {
  const conditions = statusOf(object).conditions;
  if (!Array.isArray(conditions)) {
    return [];
  }
  return conditions.flatMap(condition =>
    isRecord(condition) && typeof condition.type === 'string' && typeof condition.status === 'string'
      ? [{
        type: condition.type,
        status: condition.status,
        message: typeof condition.message === 'string' ? condition.message : undefined
      }]
      : []
  );
}

function conditionIsTrue(object: KubernetesManifest, type: string): ConditionResult {
  const condition = conditionsOf(object).find(item => item.type === type);
  if (!condition) {
    return { ready: false, reason: `no ${type} condition reported yet` };
  }
  if (condition.status === 'True') {
    return { ready: true, reason: `${type}=True` };
  }
  return { ready: false, reason: `${type}=${condition.status}${condition.message ? `: ${condition.message}` : ''}` };
}

function workloadAvailable(object: KubernetesManifest): ConditionResult {
  const status = statusOf(object);
  const spec = specOf(object);

  switch (object.kind) {
    case 'Deployment':
      return conditionIsTrue(object, 'Available');
    case 'StatefulSet': {
      const desired = asNumber(spec.replicas, 1);
      const ready = asNumber(status.readyReplicas, 0);
      return ready >= desired
        ? { ready: true, reason: `${ready}/${desired} replicas ready` }
        : { ready: false, reason: `${ready}/${desired} replicas ready` };
    }
    case 'DaemonSet': {
      const desired = asNumber(status.desiredNumberScheduled, 0);
      const ready = asNumber(status.numberReady, 0);
      return desired > 0 && ready >= desired
        ? { ready: true, reason: `${ready}/${desired} pods ready` }
        : { ready: false, reason: `${ready}/${desired} pods ready` };
    }
    case 'Job':
      return conditionIsTrue(object, 'Complete');
    default:
      return conditionIsTrue(object, 'Ready');
  }
}

function secretMaterialized(object: KubernetesManifest): ConditionResult {
  const data = isRecord(object.data) ? object.data : {};
  const populated = Object.values(data).some(value => typeof value === 'string' && value.length > 0);
  return populated
    ? { ready: true, reason: `${Object.keys(data).length} key(s) present` }
    : { ready: false, reason: 'secret exists but holds no data' };
}

function gitopsSynced(object: KubernetesManifest): ConditionResult {
  // Argo CD Applications report sync under status.sync; Flux objects use a
  // Ready condition
  const sync = statusOf(object).sync;
  if (isRecord(sync) && typeof sync.status === 'string') {
    return sync.status === 'Synced'
      ? { ready: true, reason: 'Synced' }
      : { ready: false, reason: `sync status ${sync.status}` };
  }
  return conditionIsTrue(object, 'Ready');
}

/**
 * Evaluate one readiness condition against a single live object
 */
export function evaluateCondition(check: ReadinessCheck, object: KubernetesManifest): ConditionResult {
  switch (check.condition) {
    case 'exists':
      return { ready: true, reason: 'exists' };
    case 'available':
      return workloadAvailable(object);
    case 'established':
      return conditionIsTrue(object, 'Established');
    case 'materialized':
      return secretMaterialized(object);
    case 'synced':
      return gitopsSynced(object);
    case 'ready':
      return conditionIsTrue(object, 'Ready');
  }
}

/**
 * Evaluate a check against every object its selector matched. A label
 * selector that matches nothing is not ready.
 */
export function evaluateTargets(check: ReadinessCheck, objects: KubernetesManifest[]): ConditionResult {
  if (objects.length === 0) {
    return { ready: false, reason: 'not found' };
  }

  for (const object of objects) {
    const result = evaluateCondition(check, object);
    if (!result.ready) {
      return objects.length === 1
        ? result
        : { ready: false, reason: `${object.metadata.name}: ${result.reason}` };
    }
  }

  return objects.length === 1
    ? evaluateCondition(check, objects[0])
    : { ready: true, reason: `${objects.length} objects ready` };
}

export function describeTarget(check: ReadinessCheck): string {
  const scope = check.namespace ? `${check.namespace}/` : '';
  if (check.selector.name) {
    return `${check.targetKind}/${scope}${check.selector.name}`;
  }
  const labels = Object.entries(check.selector.labels ?? {}).map(([key, value]) => `${key}=${value}`).join(',');
  return `${check.targetKind}/${scope}[${labels}]`;
}
