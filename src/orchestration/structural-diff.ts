import { KubernetesManifest } from '../types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

/**
 * Paths at which the declared payload differs from the live object. Only
 * declared fields are compared: anything the server adds (status, defaults,
 * uid, managedFields) is ignored. An empty result means the object has not
 * drifted.
 */
export function structuralDiff(declared: KubernetesManifest, live: KubernetesManifest): string[] {
  const differences: string[] = [];
  compare(normalizeDeclared(declared), live, '', differences);
  return differences;
}

function compare(declared: unknown, live: unknown, path: string, differences: string[]): void {
  if (declared === null || declared === undefined) {
    if (live !== null && live !== undefined) {
      differences.push(path || '.');
    }
    return;
  }

  if (Array.isArray(declared)) {
    if (!Array.isArray(live) || live.length !== declared.length) {
      differences.push(path || '.');
      return;
    }
    declared.forEach((item, index) => compare(item, live[index], `${path}[${index}]`, differences));
    return;
  }

  if (isRecord(declared)) {
    if (!isRecord(live)) {
      differences.push(path || '.');
      return;
    }
    for (const [key, value] of Object.entries(declared)) {
      compare(value, live[key], path ? `${path}.${key}` : key, differences);
    }
    return;
  }

  if (!scalarEquals(declared, live)) {
    differences.push(path || '.');
  }
}

/**
 * Ports and replica counts are sometimes written as strings in manifests and
 * come back as numbers
 */
function scalarEquals(declared: unknown, live: unknown): boolean {
  if (declared === live) {
    return true;
  }
  if ((typeof declared === 'number' || typeof declared === 'string') && (typeof live === 'number' || typeof live === 'string')) {
    return String(declared) === String(live);
  }
  return false;
}

/**
 * The server never returns Secret stringData; it folds it into base64 data
 */
function normalizeDeclared(declared: KubernetesManifest): KubernetesManifest {
  const stringData = declared.stringData;
  if (declared.kind !== 'Secret' || !isRecord(stringData)) {
    return declared;
  }

  const normalized: KubernetesManifest = { ...declared };
  delete normalized.stringData;
  const data: Record<string, unknown> = isRecord(declared.data) ? { ...declared.data } : {};
  for (const [key, value] of Object.entries(stringData)) {
    data[key] = Buffer.from(String(value), 'utf8').toString('base64');
  }
  normalized.data = data;
  return normalized;
}
