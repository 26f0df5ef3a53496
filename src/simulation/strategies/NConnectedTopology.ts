import type { StructureType, TopologyKind } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import { BuildAsSubstructure } from './BuildAsSubstructure';
import type { PlanContext } from './planning';

// Effective degree for m mirrors: at least 2, at most m - 1.
export function effectiveDegree(numMirrors: number, linksPerMirror: number): number {
  return Math.max(0, Math.min(Math.max(linksPerMirror, 2), numMirrors - 1));
}

// Circulant graph: node i links to i + d for d = 1..floor(k/2), plus the
// opposite node when k is odd and m even. The whole graph is laid out again on
// every change and the diff keeps the links that survive.
export class NConnectedTopology extends BuildAsSubstructure {
  readonly kind: TopologyKind = 'n_connected';

  readonly structureType: StructureType = 'n_connected';

  computeTargetLinks(numMirrors: number, linksPerMirror: number): number {
    const k = effectiveDegree(numMirrors, linksPerMirror);
    const diameters = k % 2 === 1 && numMirrors % 2 === 0 ? numMirrors / 2 : 0;
    return numMirrors * Math.floor(k / 2) + diameters;
  }

  buildStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): boolean {
    const [headId] = nodeIds;
    if (headId === undefined) {
      return false;
    }
    for (const id of nodeIds) graph.addNode(id, { kind: 'n_connected' });
    graph.setHead(headId, 'n_connected');

    const m = nodeIds.length;
    const k = effectiveDegree(m, ctx.linksPerMirror);
    const link = (from: number, to: number) => {
      const a = nodeIds[from];
      const b = nodeIds[to % m];
      if (a === undefined || b === undefined) return;
      if (graph.getChildren(b, 'n_connected', headId).includes(a)) return;
      graph.link(a, b, 'n_connected', headId);
    };

    for (let i = 0; i < m; i += 1) {
      for (let d = 1; d <= Math.floor(k / 2); d += 1) link(i, i + d);
    }
    if (k % 2 === 1 && m % 2 === 0) {
      for (let i = 0; i < m / 2; i += 1) link(i, i + m / 2);
    }
    return true;
  }

  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): number {
    const fresh = nodeIds.filter((id) => !graph.hasNode(id));
    this.relayout(graph, [...this.orderedIds(graph), ...fresh], ctx);
    return fresh.length;
  }

  // Highest ids go first; the head stays.
  removeNodesFromStructure(graph: StructureGraph, count: number, ctx: PlanContext): number[] {
    const headId = this.findStructureHead(graph);
    if (headId === undefined) {
      return [];
    }
    const victims = graph
      .nodeIds()
      .filter((id) => id !== headId)
      .sort((a, b) => b - a)
      .slice(0, Math.max(0, count));
    const survivors = this.orderedIds(graph).filter((id) => !victims.includes(id));
    this.relayout(graph, survivors, ctx);
    return victims;
  }

  // Head first, then the rest in ascending id order.
  private orderedIds(graph: StructureGraph): number[] {
    const headId = this.findStructureHead(graph);
    const rest = graph
      .nodeIds()
      .filter((id) => id !== headId)
      .sort((a, b) => a - b);
    return headId === undefined ? rest : [headId, ...rest];
  }

  private relayout(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): void {
    for (const id of graph.nodeIds()) graph.removeNode(id);
    this.buildStructure(graph, nodeIds, ctx);
  }
}
