import type { StructureType } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';

export type RuleKind = 'tree' | 'ring' | 'line' | 'star' | 'fully_connected' | 'n_connected';

// Everything a rule needs to judge one substructure. `countEdgeLinks` is
// supplied by the caller so the mirror layer can fold implemented links in.
export interface RuleContext {
  readonly graph: StructureGraph;
  readonly nodes: ReadonlySet<number>;
  readonly type: StructureType;
  readonly headId: number;
  // No node of the substructure hangs below an outside node; the head of such
  // a top-level structure needs no edge link.
  readonly standalone: boolean;
  // Raises the rule's own minimum size, as a ring strategy built for larger
  // rings does.
  readonly minSize?: number;
  countEdgeLinks(nodeId: number): number;
}

export interface RuleContextOptions {
  countEdgeLinks?: (nodeId: number, nodes: ReadonlySet<number>) => number;
  minSize?: number;
}

export interface TopologyRule {
  readonly kind: RuleKind;
  readonly minSize: number;
  isValidStructure(ctx: RuleContext): boolean;
  canBeRemovedFromStructure(ctx: RuleContext, nodeId: number): boolean;
}

export function createRuleContext(
  graph: StructureGraph,
  type: StructureType,
  headId: number,
  options: RuleContextOptions = {},
): RuleContext {
  const { countEdgeLinks, minSize } = options;
  const nodes = graph.getAllNodesInStructure(headId, type, headId);
  return {
    graph,
    nodes,
    type,
    headId,
    standalone: [...nodes].every((id) => graph.getParents(id).every((parentId) => nodes.has(parentId))),
    minSize,
    countEdgeLinks: (nodeId) => (countEdgeLinks ? countEdgeLinks(nodeId, nodes) : graph.countEdgeLinks(nodeId, nodes)),
  };
}

function hasOutsideConnection(ctx: RuleContext, nodeId: number): boolean {
  return ctx.standalone || ctx.countEdgeLinks(nodeId) > 0;
}

function minSizeOf(ctx: RuleContext, floor: number): number {
  return Math.max(floor, ctx.minSize ?? floor);
}

function headsIn(ctx: RuleContext): number[] {
  return [...ctx.nodes].filter((id) => ctx.graph.isHead(id, ctx.type));
}

function hasSingleHead(ctx: RuleContext): boolean {
  const heads = headsIn(ctx);
  return heads.length === 1 && heads[0] === ctx.headId;
}

function childCount(ctx: RuleContext, nodeId: number): number {
  return ctx.graph.getChildren(nodeId, ctx.type, ctx.headId).length;
}

function degree(ctx: RuleContext, nodeId: number): number {
  return ctx.graph.degree(nodeId, ctx.type, ctx.headId);
}

function isConnected(ctx: RuleContext): boolean {
  return ctx.graph.isConnected(ctx.nodes, ctx.type, ctx.headId);
}

const treeRule: TopologyRule = {
  kind: 'tree',
  minSize: 1,
  isValidStructure(ctx) {
    const { graph, nodes, type, headId } = ctx;
    if (!hasSingleHead(ctx) || !isConnected(ctx)) return false;
    if (graph.hasDirectedCycle(nodes, type, headId)) return false;
    if (graph.countEdges(nodes, type, headId) !== nodes.size - 1) return false;

    for (const id of nodes) {
      if (id === headId) continue;
      const parentId = graph.getParent(id, type, headId);
      if (parentId === undefined || !nodes.has(parentId)) return false;
    }
    if (graph.getParents(headId).some((parentId) => nodes.has(parentId))) return false;
    return hasOutsideConnection(ctx, headId);
  },
  canBeRemovedFromStructure(ctx, nodeId) {
    return nodeId !== ctx.headId && ctx.nodes.has(nodeId) && childCount(ctx, nodeId) === 0;
  },
};

const RING_MIN_SIZE = 3;

const ringRule: TopologyRule = {
  kind: 'ring',
  minSize: RING_MIN_SIZE,
  isValidStructure(ctx) {
    const { graph, nodes, type, headId } = ctx;
    if (!hasSingleHead(ctx) || nodes.size < minSizeOf(ctx, RING_MIN_SIZE)) return false;
    for (const id of nodes) {
      if (childCount(ctx, id) !== 1 || degree(ctx, id) !== 2) return false;
    }
    if (!graph.hasClosedCycle(nodes, type, headId)) return false;
    return hasOutsideConnection(ctx, headId);
  },
  canBeRemovedFromStructure(ctx, nodeId) {
    return nodeId !== ctx.headId && ctx.nodes.has(nodeId) && ctx.nodes.size > minSizeOf(ctx, RING_MIN_SIZE);
  },
};

const LINE_MIN_SIZE = 2;

const lineRule: TopologyRule = {
  kind: 'line',
  minSize: LINE_MIN_SIZE,
  isValidStructure(ctx) {
    const { graph, nodes, type, headId } = ctx;
    if (!hasSingleHead(ctx) || nodes.size < minSizeOf(ctx, LINE_MIN_SIZE) || !isConnected(ctx)) return false;
    if (graph.hasDirectedCycle(nodes, type, headId)) return false;

    let endpoints = 0;
    for (const id of nodes) {
      const d = degree(ctx, id);
      if (d === 1) {
        endpoints += 1;
      } else if (d !== 2 || childCount(ctx, id) !== 1) {
        return false;
      }
    }
    if (endpoints !== 2 || degree(ctx, headId) !== 1) return false;
    return hasOutsideConnection(ctx, headId);
  },
  // Only the far end may go, and two nodes must survive.
  canBeRemovedFromStructure(ctx, nodeId) {
    return (
      nodeId !== ctx.headId &&
      ctx.nodes.has(nodeId) &&
      degree(ctx, nodeId) === 1 &&
      ctx.nodes.size > minSizeOf(ctx, LINE_MIN_SIZE)
    );
  },
};

const STAR_MIN_SIZE = 3;

function isTrueLeaf(ctx: RuleContext, nodeId: number): boolean {
  return degree(ctx, nodeId) === 1 && ctx.graph.getChildren(nodeId).length === 0;
}

const starRule: TopologyRule = {
  kind: 'star',
  minSize: STAR_MIN_SIZE,
  isValidStructure(ctx) {
    const { graph, nodes, type, headId } = ctx;
    if (!nodes.has(headId) || !graph.isHead(headId, type)) return false;
    if (nodes.size < minSizeOf(ctx, STAR_MIN_SIZE) || childCount(ctx, headId) < 2 || !isConnected(ctx)) return false;

    for (const id of nodes) {
      if (id === headId) continue;
      if (graph.getParent(id, type, headId) !== headId) return false;
      if (!isTrueLeaf(ctx, id) && !graph.isHead(id, type)) return false;
    }
    return hasOutsideConnection(ctx, headId);
  },
  canBeRemovedFromStructure(ctx, nodeId) {
    return (
      nodeId !== ctx.headId &&
      ctx.nodes.has(nodeId) &&
      isTrueLeaf(ctx, nodeId) &&
      ctx.nodes.size > minSizeOf(ctx, STAR_MIN_SIZE)
    );
  },
};

function isLinked(ctx: RuleContext, a: number, b: number): boolean {
  return (
    ctx.graph.getChildren(a, ctx.type, ctx.headId).includes(b) ||
    ctx.graph.getChildren(b, ctx.type, ctx.headId).includes(a)
  );
}

const fullyConnectedRule: TopologyRule = {
  kind: 'fully_connected',
  minSize: 1,
  isValidStructure(ctx) {
    if (!hasSingleHead(ctx)) return false;
    const ids = [...ctx.nodes];
    for (let i = 0; i < ids.length; i += 1) {
      for (let j = i + 1; j < ids.length; j += 1) {
        const a = ids[i];
        const b = ids[j];
        if (a === undefined || b === undefined || !isLinked(ctx, a, b)) return false;
      }
    }
    return hasOutsideConnection(ctx, ctx.headId);
  },
  canBeRemovedFromStructure(ctx, nodeId) {
    return nodeId !== ctx.headId && ctx.nodes.has(nodeId);
  },
};

const nConnectedRule: TopologyRule = {
  kind: 'n_connected',
  minSize: 1,
  isValidStructure(ctx) {
    if (!hasSingleHead(ctx) || !isConnected(ctx)) return false;
    return hasOutsideConnection(ctx, ctx.headId);
  },
  canBeRemovedFromStructure(ctx, nodeId) {
    return nodeId !== ctx.headId && ctx.nodes.has(nodeId);
  },
};

const TOPOLOGY_RULES: Record<RuleKind, TopologyRule> = {
  tree: treeRule,
  ring: ringRule,
  line: lineRule,
  star: starRule,
  fully_connected: fullyConnectedRule,
  n_connected: nConnectedRule,
};

export function getTopologyRule(type: StructureType): TopologyRule | undefined {
  switch (type) {
    case 'tree':
    case 'ring':
    case 'line':
    case 'star':
    case 'fully_connected':
    case 'n_connected':
      return TOPOLOGY_RULES[type];
    default:
      return undefined;
  }
}

export function isValidStructure(ctx: RuleContext): boolean {
  const rule = getTopologyRule(ctx.type);
  return rule !== undefined && rule.isValidStructure(ctx);
}

export function canBeRemovedFromStructure(ctx: RuleContext, nodeId: number): boolean {
  const rule = getTopologyRule(ctx.type);
  return rule !== undefined && rule.canBeRemovedFromStructure(ctx, nodeId);
}

// Navigation helpers.

export function ringSuccessor(graph: StructureGraph, nodeId: number, headId: number): number | undefined {
  return graph.getChildren(nodeId, 'ring', headId)[0];
}

export function ringPredecessor(graph: StructureGraph, nodeId: number, headId: number): number | undefined {
  return graph.getParent(nodeId, 'ring', headId);
}

// Steps from the head following successors, or -1 when not on the ring.
export function ringPosition(graph: StructureGraph, nodeId: number, headId: number): number {
  return walkPosition(graph, 'ring', nodeId, headId);
}

export function linePosition(graph: StructureGraph, nodeId: number, headId: number): number {
  return walkPosition(graph, 'line', nodeId, headId);
}

export function lineTail(graph: StructureGraph, headId: number): number {
  const visited = new Set<number>();
  let current = headId;
  while (!visited.has(current)) {
    visited.add(current);
    const next = graph.getChildren(current, 'line', headId)[0];
    if (next === undefined) break;
    current = next;
  }
  return current;
}

export function starCenter(graph: StructureGraph, nodeId: number): number | undefined {
  if (graph.isHead(nodeId, 'star')) return nodeId;
  return graph.getParent(nodeId, 'star');
}

export function starLeaves(graph: StructureGraph, centerId: number): number[] {
  return graph
    .getChildren(centerId, 'star', centerId)
    .filter((id) => !graph.isHead(id, 'star') && graph.getChildren(id).length === 0);
}

function walkPosition(graph: StructureGraph, type: StructureType, nodeId: number, headId: number): number {
  const visited = new Set<number>();
  let current: number | undefined = headId;
  let position = 0;
  while (current !== undefined && !visited.has(current)) {
    if (current === nodeId) return position;
    visited.add(current);
    current = graph.getChildren(current, type, headId)[0];
    position += 1;
  }
  return -1;
}
