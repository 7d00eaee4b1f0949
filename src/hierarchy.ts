/**
 * Parent-before-child ordering of a project's tasks
 */

import { HierarchyCycleError } from './errors';

export interface HierarchyNode {
  id: string;
  parentId: string | null;
}

const INTEGER_ID = /^\d+$/;

/**
 * Orders source identifiers ascending. Purely numeric ids (Megaplan's usual
 * form) compare by value so "9" sorts before "10".
 */
export function compareSourceIds(a: string, b: string): number {
  if (INTEGER_ID.test(a) && INTEGER_ID.test(b)) {
    const byLength = a.replace(/^0+/, '').length - b.replace(/^0+/, '').length;
    if (byLength !== 0) return byLength;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export class HierarchyResolver {
  /**
   * Depth-first walk from the roots; siblings in ascending id order. A task
   * whose parent lies outside the set is a root.
   * Throws HierarchyCycleError when some tasks are unreachable from any root.
   */
  static order<T extends HierarchyNode>(tasks: readonly T[]): T[] {
    const byId = new Map<string, T>();
    for (const task of tasks) {
      byId.set(task.id, task);
    }

    const children = new Map<string, string[]>();
    const roots: string[] = [];
    for (const task of byId.values()) {
      if (task.parentId !== null && task.parentId !== task.id && byId.has(task.parentId)) {
        const siblings = children.get(task.parentId) ?? [];
        siblings.push(task.id);
        children.set(task.parentId, siblings);
      } else if (task.parentId !== task.id) {
        roots.push(task.id);
      }
    }

    const ordered: T[] = [];
    const visited = new Set<string>();
    const stack = [...roots].sort(compareSourceIds).reverse();

    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || visited.has(id)) continue;
      visited.add(id);

      const task = byId.get(id);
      if (task) ordered.push(task);

      const next = [...(children.get(id) ?? [])].sort(compareSourceIds).reverse();
      stack.push(...next);
    }

    if (ordered.length < byId.size) {
      throw new HierarchyCycleError(HierarchyResolver.findCycle(byId, visited));
    }
    return ordered;
  }

  /**
   * Follows parent links from the smallest unvisited id until a task repeats;
   * the repeated segment is the cycle.
   */
  private static findCycle<T extends HierarchyNode>(byId: Map<string, T>, visited: Set<string>): string[] {
    const unvisited = [...byId.keys()].filter(id => !visited.has(id)).sort(compareSourceIds);
    const chain: string[] = [];
    const position = new Map<string, number>();

    let current: string | null = unvisited[0] ?? null;
    while (current !== null && !position.has(current)) {
      position.set(current, chain.length);
      chain.push(current);
      current = byId.get(current)?.parentId ?? null;
    }

    if (current === null) return chain;
    return chain.slice(position.get(current) ?? 0);
  }
}
