import type { MirrorPair, StructureType } from '../types/simulation';
import type { TopologyHost } from '../network/contracts';
import { StructureGraph } from '../structure/StructureGraph';

export interface PlanContext {
  readonly linksPerMirror: number;
}

export type TopologyRequest =
  | { kind: 'build'; nodeIds: readonly number[] }
  | { kind: 'add'; nodeIds: readonly number[] }
  | { kind: 'remove'; count: number };

// Pure structure mutation for one topology. Implementations only touch the
// graph they are handed.
export interface StructurePlanner {
  readonly structureType: StructureType;
  buildStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): boolean;
  addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): number;
  removeNodesFromStructure(graph: StructureGraph, count: number, ctx: PlanContext): number[];
  validateStructure(graph: StructureGraph): boolean;
}

export interface StructureDiff {
  addedNodes: number[];
  removedNodes: number[];
  linksToCreate: MirrorPair[];
  linksToRemove: MirrorPair[];
}

export interface PlanResult {
  graph: StructureGraph;
  diff: StructureDiff;
  applied: number;
  valid: boolean;
}

export interface ExecutionResult {
  linksCreated: number;
  linksRemoved: number;
}

// Works the request on a copy of `current`. A draft that fails validation is
// dropped: `current` comes back unchanged with an empty diff and nothing
// applied. A failed build leaves an empty structure, since a rebuild replaces
// the old one regardless.
export function planTopologyChange(
  planner: StructurePlanner,
  current: StructureGraph,
  request: TopologyRequest,
  ctx: PlanContext,
): PlanResult {
  if (request.kind === 'build') {
    const draft = new StructureGraph();
    const built =
      request.nodeIds.length === 0 ||
      (planner.buildStructure(draft, request.nodeIds, ctx) && planner.validateStructure(draft));
    const graph = built ? draft : new StructureGraph();
    return { graph, diff: diffStructures(current, graph), applied: graph.size, valid: built };
  }

  const draft = current.clone();
  const applied =
    request.kind === 'add'
      ? planner.addNodesToStructure(draft, request.nodeIds, ctx)
      : planner.removeNodesFromStructure(draft, request.count, ctx).length;

  if (draft.size > 0 && !planner.validateStructure(draft)) {
    return { graph: current, diff: emptyDiff(), applied: 0, valid: false };
  }
  return { graph: draft, diff: diffStructures(current, draft), applied, valid: true };
}

export function emptyDiff(): StructureDiff {
  return { addedNodes: [], removedNodes: [], linksToCreate: [], linksToRemove: [] };
}

// Edges compared as unordered pairs; a pair present on both sides needs no work.
export function diffStructures(before: StructureGraph, after: StructureGraph): StructureDiff {
  const beforePairs = pairsOf(before);
  const afterPairs = pairsOf(after);
  return {
    addedNodes: after.nodeIds().filter((id) => !before.hasNode(id)),
    removedNodes: before.nodeIds().filter((id) => !after.hasNode(id)),
    linksToCreate: [...afterPairs].filter(([key]) => !beforePairs.has(key)).map(([, pair]) => pair),
    linksToRemove: [...beforePairs].filter(([key]) => !afterPairs.has(key)).map(([, pair]) => pair),
  };
}

export function executeDiff(host: TopologyHost, diff: StructureDiff, simTime: number): ExecutionResult {
  let linksRemoved = 0;
  for (const pair of diff.linksToRemove) {
    linksRemoved += host.disconnect(pair.sourceId, pair.targetId, simTime);
  }
  let linksCreated = 0;
  for (const pair of diff.linksToCreate) {
    if (host.connect(pair.sourceId, pair.targetId, simTime)) linksCreated += 1;
  }
  return { linksCreated, linksRemoved };
}

function pairsOf(graph: StructureGraph): Map<string, MirrorPair> {
  const pairs = new Map<string, MirrorPair>();
  for (const edge of graph.edges()) {
    const key = `${Math.min(edge.parentId, edge.childId)}:${Math.max(edge.parentId, edge.childId)}`;
    if (!pairs.has(key)) pairs.set(key, { sourceId: edge.parentId, targetId: edge.childId });
  }
  return pairs;
}
