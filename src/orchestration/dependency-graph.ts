import { ConfigurationError, ConfigurationIssue, CycleDetectedError } from '../errors';

/**
 * Anything with a name and a list of names it depends on
 */
export interface GraphNode {
  name: string;
  dependsOn: string[];
}

/**
 * Directed acyclic graph over phases. Construction validates the input and
 * computes the execution order once.
 */
export class DependencyGraph<T extends GraphNode> {
  readonly order: T[];
  private readonly byName: Map<string, T>;
  private readonly dependents: Map<string, string[]>;

  private constructor(nodes: T[], order: T[]) {
    this.order = order;
    this.byName = new Map(nodes.map(node => [node.name, node]));
    this.dependents = new Map<string, string[]>(nodes.map(node => [node.name, []]));
    for (const node of nodes) {
      for (const dependency of node.dependsOn) {
        this.dependents.get(dependency)?.push(node.name);
      }
    }
  }

  /**
   * Validate the nodes and compute a topological order with Kahn's
   * algorithm. Ties between simultaneously eligible nodes are broken by
   * declaration order.
   *
   * @throws ConfigurationError on duplicate names or unknown dependencies
   * @throws CycleDetectedError naming one offending cycle
   */
  static build<T extends GraphNode>(nodes: T[]): DependencyGraph<T> {
    validateNodes(nodes);

    const position = new Map(nodes.map((node, index) => [node.name, index]));
    const inDegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const node of nodes) {
      inDegree.set(node.name, new Set(node.dependsOn).size);
      dependents.set(node.name, []);
    }
    for (const node of nodes) {
      for (const dependency of new Set(node.dependsOn)) {
        dependents.get(dependency)?.push(node.name);
      }
    }

    const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
    const ready = nodes.filter(node => inDegree.get(node.name) === 0).map(node => node.name);
    const order: T[] = [];

    while (ready.length > 0) {
      ready.sort(byPosition);
      const name = ready.shift();
      if (name === undefined) {
        break;
      }
      order.push(nodes[position.get(name) ?? 0]);

      for (const dependent of dependents.get(name) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) {
          ready.push(dependent);
        }
      }
    }

    if (order.length !== nodes.length) {
      const blocked = nodes.filter(node => (inDegree.get(node.name) ?? 0) > 0);
      throw new CycleDetectedError(findCycle(blocked));
    }

    return new DependencyGraph(nodes, order);
  }

  get(name: string): T | undefined {
    return this.byName.get(name);
  }

  /**
   * Every node that depends on `name`, directly or transitively, in
   * execution order
   */
  transitiveDependents(name: string): T[] {
    const seen = new Set<string>();
    const queue = [...(this.dependents.get(name) ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) {
        continue;
      }
      seen.add(next);
      queue.push(...(this.dependents.get(next) ?? []));
    }
    return this.order.filter(node => seen.has(node.name));
  }

  reverseOrder(): T[] {
    return [...this.order].reverse();
  }
}

function validateNodes(nodes: GraphNode[]): void {
  const issues: ConfigurationIssue[] = [];
  const names = new Set<string>();

  for (const node of nodes) {
    if (names.has(node.name)) {
      issues.push({ location: node.name, message: 'duplicate phase name' });
    }
    names.add(node.name);
  }

  for (const node of nodes) {
    for (const dependency of node.dependsOn) {
      if (dependency === node.name) {
        issues.push({ location: node.name, message: 'phase depends on itself' });
      } else if (!names.has(dependency)) {
        issues.push({ location: `${node.name}.dependsOn`, message: `unknown phase "${dependency}"` });
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues, 'Invalid phase graph');
  }
}

/**
 * Walk dependency edges among the blocked nodes until a node repeats. Every
 * blocked node has at least one blocked dependency, so the walk must close.
 */
function findCycle(blocked: GraphNode[]): string[] {
  const blockedByName = new Map(blocked.map(node => [node.name, node]));
  const path: string[] = [];
  const indexInPath = new Map<string, number>();
  let current: GraphNode | undefined = blocked[0];

  while (current && !indexInPath.has(current.name)) {
    indexInPath.set(current.name, path.length);
    path.push(current.name);
    const next: string | undefined = current.dependsOn.find(dependency => blockedByName.has(dependency));
    current = next === undefined ? undefined : blockedByName.get(next);
  }

  if (!current) {
    return path;
  }
  const start = indexInPath.get(current.name) ?? 0;
  const cycle = path.slice(start);
  // Each name depends on the one after it
  return [...cycle, cycle[0]];
}
