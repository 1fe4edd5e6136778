import { ConfigError } from './errors';

export interface DependencyNode {
  name: string;
  dependsOn: readonly string[];
}

/**
 * Order nodes so that every node comes after the nodes it depends on.
 * Among nodes that are ready at the same time, declaration order wins.
 *
 * Unknown dependencies and cycles throw ConfigError.
 */
export const resolveOrder = (nodes: readonly DependencyNode[]): string[] => {
  const names = new Set(nodes.map(n => n.name));

  for (const node of nodes) {
    const unknown = node.dependsOn.filter(dep => !names.has(dep));
    if (unknown.length) {
      throw new ConfigError(`Repository "${node.name}" depends on unknown repositories: ${unknown.join(', ')}`);
    }
  }

  const placed = new Set<string>();
  const order: string[] = [];
  let pending = [...nodes];

  while (pending.length) {
    const ready = pending.find(node => node.dependsOn.every(dep => placed.has(dep)));
    if (!ready) {
      throw new ConfigError(`Dependency cycle between repositories: ${pending.map(n => n.name).join(', ')}`);
    }
    placed.add(ready.name);
    order.push(ready.name);
    pending = pending.filter(node => node !== ready);
  }

  return order;
};

/** Dependents first; the order to tear things down in. */
export const reverseOrder = (nodes: readonly DependencyNode[]): string[] => resolveOrder(nodes).reverse();

/**
 * Sort a subset of nodes by their position in the full dependency order.
 */
export const sortByOrder = <T extends { name: string }>(items: readonly T[], order: readonly string[]): T[] =>
  [...items].sort((a, b) => order.indexOf(a.name) - order.indexOf(b.name));
