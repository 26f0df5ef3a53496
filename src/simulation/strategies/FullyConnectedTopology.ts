import type { StructureType, TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { BuildAsSubstructure } from './BuildAsSubstructure';

// Every mirror linked to every other one.
export class FullyConnectedTopology extends BuildAsSubstructure {
  readonly kind: TopologyKind = 'fully_connected';

  readonly structureType: StructureType = 'fully_connected';

  computeTargetLinks(numMirrors: number): number {
    return numMirrors > 1 ? (numMirrors * (numMirrors - 1)) / 2 : 0;
  }

  buildStructure(graph: StructureGraph, nodeIds: readonly number[]): boolean {
    const [headId, ...rest] = nodeIds;
    if (headId === undefined) {
      return false;
    }
    graph.addNode(headId, { kind: 'fully_connected' });
    graph.setHead(headId, 'fully_connected');
    return this.addNodesToStructure(graph, rest) === rest.length;
  }

  // Every existing node gets a link to each newcomer.
  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[]): number {
    const headId = this.findStructureHead(graph);
    if (headId === undefined) {
      return 0;
    }
    let added = 0;
    for (const id of nodeIds) {
      const existing = graph.nodeIds();
      if (!graph.addNode(id, { kind: 'fully_connected' })) break;
      for (const other of existing) graph.link(other, id, 'fully_connected', headId);
      added += 1;
    }
    return added;
  }

  // Highest ids go first; the head stays.
  removeNodesFromStructure(graph: StructureGraph, count: number): number[] {
    const headId = this.findStructureHead(graph);
    if (headId === undefined) {
      return [];
    }
    const victims = graph
      .nodeIds()
      .filter((id) => id !== headId)
      .sort((a, b) => b - a)
      .slice(0, Math.max(0, count));
    for (const id of victims) graph.removeNode(id);
    return victims;
  }
}
