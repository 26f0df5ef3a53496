import type { TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { BalancedTreeTopologyStrategy, treeLevels } from './BalancedTreeTopologyStrategy';

// Tree that grows downwards first: each new node hangs below the deepest,
// most recent node that still sits above `maxDepth`. Fan-out is unbounded.
export class DepthLimitedTreeTopologyStrategy extends BalancedTreeTopologyStrategy {
  readonly kind: TopologyKind = 'depth_limited_tree';

  readonly maxDepth: number;

  constructor(maxDepth = 3) {
    super();
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
    }
    this.maxDepth = maxDepth;
  }

  protected selectParent(graph: StructureGraph, rootId: number): number | undefined {
    let best: { id: number; depth: number } | undefined;
    for (const entry of treeLevels(graph, rootId)) {
      if (entry.depth >= this.maxDepth) continue;
      if (!best || entry.depth > best.depth || (entry.depth === best.depth && entry.id > best.id)) {
        best = entry;
      }
    }
    return best?.id;
  }

  protected capacity(): number {
    return Number.POSITIVE_INFINITY;
  }
}
