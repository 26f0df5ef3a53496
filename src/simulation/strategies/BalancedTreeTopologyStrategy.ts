import type { StructureType, TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { BuildAsSubstructure } from './BuildAsSubstructure';
import type { PlanContext } from './planning';

// Nodes by breadth-first order from the root, with their depth.
export function treeLevels(graph: StructureGraph, rootId: number): Array<{ id: number; depth: number }> {
  const order = [{ id: rootId, depth: 0 }];
  const seen = new Set([rootId]);
  for (let i = 0; i < order.length; i += 1) {
    const entry = order[i];
    if (!entry) continue;
    for (const childId of graph.getChildren(entry.id, 'tree', rootId)) {
      if (seen.has(childId)) continue;
      seen.add(childId);
      order.push({ id: childId, depth: entry.depth + 1 });
    }
  }
  return order;
}

// Tree filled level by level: each node takes up to `linksPerMirror` children
// before the next node on the same level gets any.
export class BalancedTreeTopologyStrategy extends BuildAsSubstructure {
  readonly kind: TopologyKind = 'balanced_tree';

  readonly structureType: StructureType = 'tree';

  computeTargetLinks(numMirrors: number): number {
    return Math.max(0, numMirrors - 1);
  }

  buildStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): boolean {
    const [rootId, ...rest] = nodeIds;
    if (rootId === undefined) {
      return false;
    }
    graph.addNode(rootId, { kind: 'tree', maxChildren: this.capacity(ctx) });
    graph.setHead(rootId, 'tree');
    return this.addNodesToStructure(graph, rest, ctx) === rest.length;
  }

  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): number {
    const rootId = this.findStructureHead(graph);
    if (rootId === undefined) {
      return 0;
    }
    let added = 0;
    for (const id of nodeIds) {
      const parent = this.selectParent(graph, rootId);
      if (parent === undefined || !graph.addNode(id, { kind: 'tree', maxChildren: this.capacity(ctx) })) break;
      if (!graph.link(parent, id, 'tree', rootId)) {
        graph.removeNode(id);
        break;
      }
      added += 1;
    }
    return added;
  }

  // Deepest leaf first, highest id on ties. The root stays.
  removeNodesFromStructure(graph: StructureGraph, count: number): number[] {
    const rootId = this.findStructureHead(graph);
    const removed: number[] = [];
    if (rootId === undefined) {
      return removed;
    }
    while (removed.length < count) {
      const victim = deepestLeaf(graph, rootId);
      if (victim === undefined) break;
      graph.removeNode(victim);
      removed.push(victim);
    }
    return removed;
  }

  protected selectParent(graph: StructureGraph, rootId: number): number | undefined {
    return treeLevels(graph, rootId).find((entry) => graph.canAcceptMoreChildren(entry.id))?.id;
  }

  protected capacity(ctx: PlanContext): number {
    return Math.max(1, ctx.linksPerMirror);
  }
}

export function deepestLeaf(graph: StructureGraph, rootId: number): number | undefined {
  let best: { id: number; depth: number } | undefined;
  for (const entry of treeLevels(graph, rootId)) {
    if (entry.id === rootId || !graph.isLeaf(entry.id, 'tree', rootId)) continue;
    if (!best || entry.depth > best.depth || (entry.depth === best.depth && entry.id > best.id)) {
      best = entry;
    }
  }
  return best?.id;
}
