import type { StructureType, TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { lineTail } from '../nodes/topologyRules';
import { BuildAsSubstructure } from './BuildAsSubstructure';

const MIN_LINE_SIZE = 2;

// A chain from the head; it only ever changes at the far end.
export class LineTopologyStrategy extends BuildAsSubstructure {
  readonly kind: TopologyKind = 'line';

  readonly structureType: StructureType = 'line';

  computeTargetLinks(numMirrors: number): number {
    return numMirrors >= MIN_LINE_SIZE ? numMirrors - 1 : 0;
  }

  buildStructure(graph: StructureGraph, nodeIds: readonly number[]): boolean {
    const [headId, ...rest] = nodeIds;
    if (headId === undefined || nodeIds.length < MIN_LINE_SIZE) {
      return false;
    }
    graph.addNode(headId, { kind: 'line' });
    graph.setHead(headId, 'line');
    return this.addNodesToStructure(graph, rest) === rest.length;
  }

  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[]): number {
    const headId = this.findStructureHead(graph);
    if (headId === undefined) {
      return 0;
    }
    let tailId = lineTail(graph, headId);
    let added = 0;
    for (const id of nodeIds) {
      if (!graph.addNode(id, { kind: 'line' })) break;
      graph.link(tailId, id, 'line', headId);
      tailId = id;
      added += 1;
    }
    return added;
  }

  // Drops the tail while at least two nodes would remain.
  removeNodesFromStructure(graph: StructureGraph, count: number): number[] {
    const headId = this.findStructureHead(graph);
    const removed: number[] = [];
    if (headId === undefined) {
      return removed;
    }
    let size = graph.getAllNodesInStructure(headId, 'line', headId).size;
    while (removed.length < count && size > MIN_LINE_SIZE) {
      const tailId = lineTail(graph, headId);
      if (tailId === headId) break;
      graph.removeNode(tailId);
      removed.push(tailId);
      size -= 1;
    }
    return removed;
  }
}
