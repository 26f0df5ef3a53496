import type { StructureType, TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { createRuleContext, isValidStructure, starLeaves } from '../nodes/topologyRules';
import { BuildAsSubstructure } from './BuildAsSubstructure';

// A ring of `ringSize` nodes, each of which is also the center of a star.
// Ring edges and star edges carry separate memberships, so the ring and every
// star validate on their own.
export class SnowflakeTopologyStrategy extends BuildAsSubstructure {
  readonly kind: TopologyKind = 'snowflake';

  readonly structureType: StructureType = 'ring';

  readonly ringSize: number;

  constructor(ringSize = 3) {
    super();
    if (!Number.isInteger(ringSize) || ringSize < 3) {
      throw new RangeError(`ringSize must be an integer of at least 3, got ${ringSize}`);
    }
    this.ringSize = ringSize;
  }

  // Every center keeps at least two leaves.
  get minSize(): number {
    return this.ringSize * 3;
  }

  computeTargetLinks(numMirrors: number): number {
    return numMirrors >= this.minSize ? numMirrors : 0;
  }

  buildStructure(graph: StructureGraph, nodeIds: readonly number[]): boolean {
    const ring = nodeIds.slice(0, this.ringSize);
    const [headId] = ring;
    if (headId === undefined || nodeIds.length < this.minSize) {
      return false;
    }
    for (const id of ring) {
      graph.addNode(id, { kind: 'ring' });
      graph.setHead(id, 'star');
    }
    graph.setHead(headId, 'ring');
    ring.forEach((id, index) => {
      graph.link(id, ring[index + 1] ?? headId, 'ring', headId);
    });

    nodeIds.slice(this.ringSize).forEach((leafId, index) => {
      const centerId = ring[index % ring.length];
      if (centerId === undefined) return;
      graph.addNode(leafId, { kind: 'star' });
      graph.link(centerId, leafId, 'star', centerId);
    });
    return true;
  }

  // New leaves go to the center with the fewest leaves.
  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[]): number {
    const centers = this.centers(graph);
    let added = 0;
    for (const id of nodeIds) {
      const centerId = pickCenter(graph, centers, (count, best) => count < best);
      if (centerId === undefined || !graph.addNode(id, { kind: 'star' })) break;
      graph.link(centerId, id, 'star', centerId);
      added += 1;
    }
    return added;
  }

  // Leaves come off the center with the most, down to two per center.
  removeNodesFromStructure(graph: StructureGraph, count: number): number[] {
    const centers = this.centers(graph);
    const removed: number[] = [];
    while (removed.length < count) {
      const centerId = pickCenter(graph, centers, (leaves, best) => leaves > best);
      const leafId = centerId === undefined ? undefined : starLeaves(graph, centerId).at(-1);
      if (centerId === undefined || leafId === undefined || starLeaves(graph, centerId).length <= 2) break;
      graph.removeNode(leafId);
      removed.push(leafId);
    }
    return removed;
  }

  validateStructure(graph: StructureGraph): boolean {
    const headId = this.findStructureHead(graph);
    if (headId === undefined) {
      return false;
    }
    const ring = createRuleContext(graph, 'ring', headId);
    if (ring.nodes.size !== this.ringSize || !isValidStructure(ring)) {
      return false;
    }
    let covered = 0;
    for (const centerId of ring.nodes) {
      const star = createRuleContext(graph, 'star', centerId);
      if (!isValidStructure(star)) return false;
      covered += star.nodes.size;
    }
    return covered === graph.size;
  }

  // Ring nodes in order, starting at the head.
  private centers(graph: StructureGraph): number[] {
    const headId = this.findStructureHead(graph);
    const centers: number[] = [];
    let current = headId;
    while (current !== undefined && !centers.includes(current)) {
      centers.push(current);
      current = graph.getChildren(current, 'ring', headId)[0];
    }
    return centers;
  }
}

function pickCenter(
  graph: StructureGraph,
  centers: readonly number[],
  better: (leaves: number, best: number) => boolean,
): number | undefined {
  let best: { id: number; leaves: number } | undefined;
  for (const id of centers) {
    const leaves = starLeaves(graph, id).length;
    if (!best || better(leaves, best.leaves)) best = { id, leaves };
  }
  return best?.id;
}
