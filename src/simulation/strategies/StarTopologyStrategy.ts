import type { StructureType, TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { starLeaves } from '../nodes/topologyRules';
import { BuildAsSubstructure } from './BuildAsSubstructure';

const MIN_STAR_SIZE = 3;

// One center, everything else a leaf of it.
export class StarTopologyStrategy extends BuildAsSubstructure {
  readonly kind: TopologyKind = 'star';

  readonly structureType: StructureType = 'star';

  computeTargetLinks(numMirrors: number): number {
    return numMirrors >= MIN_STAR_SIZE ? numMirrors - 1 : 0;
  }

  buildStructure(graph: StructureGraph, nodeIds: readonly number[]): boolean {
    const [centerId, ...leaves] = nodeIds;
    if (centerId === undefined || nodeIds.length < MIN_STAR_SIZE) {
      return false;
    }
    graph.addNode(centerId, { kind: 'star' });
    graph.setHead(centerId, 'star');
    return this.addNodesToStructure(graph, leaves) === leaves.length;
  }

  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[]): number {
    const centerId = this.findStructureHead(graph);
    if (centerId === undefined) {
      return 0;
    }
    let added = 0;
    for (const id of nodeIds) {
      if (!graph.addNode(id, { kind: 'star' })) break;
      graph.link(centerId, id, 'star', centerId);
      added += 1;
    }
    return added;
  }

  // Latest leaves go first; the center and two leaves always stay.
  removeNodesFromStructure(graph: StructureGraph, count: number): number[] {
    const centerId = this.findStructureHead(graph);
    const removed: number[] = [];
    if (centerId === undefined) {
      return removed;
    }
    const leaves = starLeaves(graph, centerId);
    while (removed.length < count && leaves.length + 1 > MIN_STAR_SIZE) {
      const leafId = leaves.pop();
      if (leafId === undefined) break;
      graph.removeNode(leafId);
      removed.push(leafId);
    }
    return removed;
  }
}
