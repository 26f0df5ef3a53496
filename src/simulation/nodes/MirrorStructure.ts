import type { StructureType } from '../types/simulation';
import type { StructureGraph } from '../structure/StructureGraph';
import type { Link } from '../network/Link';
import type { Mirror } from '../network/Mirror';
import { canBeRemovedFromStructure, createRuleContext, isValidStructure, type RuleContext } from './topologyRules';

export type MirrorLookup = (nodeId: number) => Mirror | undefined;

// Binds structural nodes to the mirrors they stand for. The graph says which
// links should exist (planned); the mirrors say which ones do (implemented).
// It never creates or closes links itself.
export class MirrorStructure {
  constructor(
    readonly graph: StructureGraph,
    private readonly lookup: MirrorLookup,
    private readonly minSizes: Partial<Record<StructureType, number>> = {},
  ) {}

  getMirror(nodeId: number): Mirror | undefined {
    return this.graph.hasNode(nodeId) ? this.lookup(nodeId) : undefined;
  }

  // Neighbours over edges of the node's own kind; an untyped node counts
  // every edge.
  getNumPlannedLinks(nodeId: number): number {
    const node = this.graph.getNode(nodeId);
    if (!node) {
      return 0;
    }
    const type = node.kind === 'default' ? undefined : node.kind;
    const neighbours = new Set(this.graph.getChildren(nodeId, type));
    for (const parentId of this.graph.getParents(nodeId)) {
      if (this.graph.getChildren(parentId, type).includes(nodeId)) neighbours.add(parentId);
    }
    return neighbours.size;
  }

  getNumImplementedLinks(nodeId: number): number {
    return this.getMirror(nodeId)?.links.size ?? 0;
  }

  getNumPendingLinks(nodeId: number): number {
    return Math.max(0, this.getNumPlannedLinks(nodeId) - this.getNumImplementedLinks(nodeId));
  }

  hasStructuralEdge(a: number, b: number, type?: StructureType, headId?: number): boolean {
    return this.graph.getChildren(a, type, headId).includes(b) || this.graph.getChildren(b, type, headId).includes(a);
  }

  // Planned and realized: a structural edge exists and the mirrors share a link.
  isLinkedWith(a: number, b: number, type?: StructureType, headId?: number): boolean {
    const mirrorA = this.getMirror(a);
    const mirrorB = this.getMirror(b);
    if (!mirrorA || !mirrorB) {
      return false;
    }
    return this.hasStructuralEdge(a, b, type, headId) && mirrorA.isLinkedWith(mirrorB);
  }

  getMirrorsOfStructure(type: StructureType, headId: number): Mirror[] {
    const mirrors: Mirror[] = [];
    for (const nodeId of this.graph.getAllNodesInStructure(headId, type, headId)) {
      const mirror = this.getMirror(nodeId);
      if (mirror) mirrors.push(mirror);
    }
    return mirrors;
  }

  // Links with both endpoints inside the substructure.
  getLinksOfStructure(type: StructureType, headId: number): Set<Link> {
    return this.collectLinks(type, headId, (inside) => inside === 2);
  }

  // Links with exactly one endpoint inside the substructure.
  getEdgeLinks(type: StructureType, headId: number): Set<Link> {
    return this.collectLinks(type, headId, (inside) => inside === 1);
  }

  // Distinct outside neighbours of a node, counting structural edges and
  // implemented links alike.
  countEdgeLinks(nodeId: number, members: ReadonlySet<number>): number {
    const outside = new Set<number>();
    for (const neighbour of [...this.graph.getParents(nodeId), ...this.graph.getChildren(nodeId)]) {
      if (!members.has(neighbour)) outside.add(neighbour);
    }
    const mirror = this.getMirror(nodeId);
    if (mirror) {
      for (const link of mirror.links) {
        const other = link.other(mirror);
        if (other && !members.has(other.id)) outside.add(other.id);
      }
    }
    return outside.size;
  }

  ruleContext(type: StructureType, headId: number): RuleContext {
    return createRuleContext(this.graph, type, headId, {
      countEdgeLinks: (nodeId, nodes) => this.countEdgeLinks(nodeId, nodes),
      minSize: this.minSizes[type],
    });
  }

  // Topology rules hold and every planned edge of the substructure is realized.
  isValidStructure(type: StructureType, headId: number): boolean {
    const ctx = this.ruleContext(type, headId);
    if (!isValidStructure(ctx)) {
      return false;
    }
    for (const nodeId of ctx.nodes) {
      for (const childId of this.graph.getChildren(nodeId, type, headId)) {
        if (!this.isLinkedWith(nodeId, childId, type, headId)) return false;
      }
    }
    return true;
  }

  canBeRemovedFromStructure(nodeId: number, type: StructureType, headId: number): boolean {
    return canBeRemovedFromStructure(this.ruleContext(type, headId), nodeId);
  }

  private collectLinks(type: StructureType, headId: number, accept: (inside: number) => boolean): Set<Link> {
    const mirrors = new Set(this.getMirrorsOfStructure(type, headId));
    const result = new Set<Link>();
    for (const mirror of mirrors) {
      for (const link of mirror.links) {
        const inside = (mirrors.has(link.source) ? 1 : 0) + (mirrors.has(link.target) ? 1 : 0);
        if (accept(inside)) result.add(link);
      }
    }
    return result;
  }
}
