import type { StructureType, TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { ringPredecessor } from '../nodes/topologyRules';
import { BuildAsSubstructure } from './BuildAsSubstructure';

export class RingTopologyStrategy extends BuildAsSubstructure {
  readonly kind: TopologyKind = 'ring';

  readonly structureType: StructureType = 'ring';

  readonly minRingSize: number;

  constructor(minRingSize = 3) {
    super();
    if (!Number.isInteger(minRingSize) || minRingSize < 3) {
      throw new RangeError(`minRingSize must be an integer of at least 3, got ${minRingSize}`);
    }
    this.minRingSize = minRingSize;
  }

  protected get structureMinSize(): number {
    return this.minRingSize;
  }

  computeTargetLinks(numMirrors: number): number {
    return numMirrors >= this.minRingSize ? numMirrors : 0;
  }

  buildStructure(graph: StructureGraph, nodeIds: readonly number[]): boolean {
    const [headId] = nodeIds;
    if (headId === undefined || nodeIds.length < this.minRingSize) {
      return false;
    }
    for (const id of nodeIds) graph.addNode(id, { kind: 'ring' });
    graph.setHead(headId, 'ring');
    nodeIds.forEach((id, index) => {
      graph.link(id, nodeIds[index + 1] ?? headId, 'ring', headId);
    });
    return true;
  }

  // Each new node is spliced in between the tail and the head.
  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[]): number {
    const headId = this.findStructureHead(graph);
    if (headId === undefined) {
      return 0;
    }
    let added = 0;
    for (const id of nodeIds) {
      const tailId = ringPredecessor(graph, headId, headId);
      if (tailId === undefined || !graph.addNode(id, { kind: 'ring' })) break;
      graph.removeChild(tailId, headId, ['ring']);
      graph.link(tailId, id, 'ring', headId);
      graph.link(id, headId, 'ring', headId);
      added += 1;
    }
    return added;
  }

  // Removes tail nodes and closes the gap; never goes below minRingSize.
  removeNodesFromStructure(graph: StructureGraph, count: number): number[] {
    const headId = this.findStructureHead(graph);
    const removed: number[] = [];
    if (headId === undefined) {
      return removed;
    }
    const ringSize = graph.getAllNodesInStructure(headId, 'ring', headId).size;
    const allowed = Math.min(count, ringSize - this.minRingSize);
    while (removed.length < allowed) {
      const tailId = ringPredecessor(graph, headId, headId);
      if (tailId === undefined || tailId === headId) break;
      const beforeTail = ringPredecessor(graph, tailId, headId);
      if (beforeTail === undefined) break;
      graph.removeNode(tailId);
      graph.link(beforeTail, headId, 'ring', headId);
      removed.push(tailId);
    }
    return removed;
  }
}
