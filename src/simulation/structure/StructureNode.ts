import type { StructureType } from '../types/simulation';

// One parent→child edge. `memberships` maps every structure type the edge takes
// part in to the id of the head node that owns it for that type, which lets a
// single edge belong to several independent structures at once.
export interface ChildRecord {
  readonly childId: number;
  readonly memberships: Map<StructureType, number>;
}

export interface StructureNode {
  readonly id: number;
  kind: StructureType;
  maxChildren: number;
  readonly nodeTypes: Set<StructureType>;
  readonly heads: Set<StructureType>;
  readonly children: ChildRecord[];
  // Incoming edges in attachment order; the first one is the primary parent.
  readonly parentIds: number[];
}

export function createStructureNode(id: number, kind: StructureType, maxChildren: number): StructureNode {
  return {
    id,
    kind,
    maxChildren: Math.max(0, maxChildren),
    nodeTypes: new Set<StructureType>(['default', kind]),
    heads: new Set<StructureType>(),
    children: [],
    parentIds: [],
  };
}

export function belongsToStructure(record: ChildRecord, type: StructureType, headId: number): boolean {
  return record.memberships.get(type) === headId;
}

export function copyStructureNode(node: StructureNode): StructureNode {
  return {
    id: node.id,
    kind: node.kind,
    maxChildren: node.maxChildren,
    nodeTypes: new Set(node.nodeTypes),
    heads: new Set(node.heads),
    children: node.children.map((record) => ({ childId: record.childId, memberships: new Map(record.memberships) })),
    parentIds: [...node.parentIds],
  };
}
