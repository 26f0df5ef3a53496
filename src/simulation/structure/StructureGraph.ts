import type { StructureType } from '../types/simulation';
import {
  belongsToStructure,
  copyStructureNode,
  createStructureNode,
  type ChildRecord,
  type StructureNode,
} from './StructureNode';

export interface StructureEdge {
  parentId: number;
  childId: number;
  memberships: ReadonlyMap<StructureType, number>;
}

export type HeadIds = Partial<Record<StructureType, number>>;

export interface AddNodeOptions {
  kind?: StructureType;
  maxChildren?: number;
}

// Arena of structural nodes referenced by integer id. Edges live on the parent
// as ChildRecords and are mirrored by parentIds on the child, so every
// traversal here is index based and iterative; rings are a legal topology and
// each walk keeps an explicit visited set.
export class StructureGraph {
  private readonly nodes = new Map<number, StructureNode>();

  get size(): number {
    return this.nodes.size;
  }

  addNode(id: number, options: AddNodeOptions = {}): boolean {
    if (this.nodes.has(id)) {
      return false;
    }
    this.nodes.set(id, createStructureNode(id, options.kind ?? 'default', options.maxChildren ?? Number.POSITIVE_INFINITY));
    return true;
  }

  hasNode(id: number): boolean {
    return this.nodes.has(id);
  }

  getNode(id: number): StructureNode | undefined {
    return this.nodes.get(id);
  }

  nodeIds(): number[] {
    return Array.from(this.nodes.keys());
  }

  setMaxChildren(id: number, maxChildren: number): void {
    const node = this.nodes.get(id);
    if (node) {
      node.maxChildren = Math.max(0, maxChildren);
    }
  }

  removeNode(id: number): boolean {
    const node = this.nodes.get(id);
    if (!node) {
      return false;
    }
    for (const parentId of node.parentIds) {
      const parent = this.nodes.get(parentId);
      if (!parent) continue;
      const idx = parent.children.findIndex((record) => record.childId === id);
      if (idx >= 0) parent.children.splice(idx, 1);
    }
    for (const record of node.children) {
      const child = this.nodes.get(record.childId);
      if (!child) continue;
      removeFirst(child.parentIds, id);
    }
    this.nodes.delete(id);
    return true;
  }

  // Records parent→child tagged with every type in `types`, each owned by
  // headIds[type]. No-op (false) for unknown nodes, self edges, duplicate
  // children, a parent at capacity, or a type without a head id.
  addChild(parentId: number, childId: number, types: readonly StructureType[], headIds: HeadIds): boolean {
    if (parentId === childId || types.length === 0) {
      return false;
    }
    const parent = this.nodes.get(parentId);
    const child = this.nodes.get(childId);
    if (!parent || !child) {
      return false;
    }
    if (parent.children.some((record) => record.childId === childId)) {
      return false;
    }
    if (parent.children.length >= parent.maxChildren) {
      return false;
    }
    const memberships = collectMemberships(types, headIds);
    if (!memberships) {
      return false;
    }

    parent.children.push({ childId, memberships });
    child.parentIds.push(parentId);
    for (const type of types) {
      parent.nodeTypes.add(type);
      child.nodeTypes.add(type);
    }
    return true;
  }

  link(parentId: number, childId: number, type: StructureType, headId: number): boolean {
    const headIds: HeadIds = {};
    headIds[type] = headId;
    return this.addChild(parentId, childId, [type], headIds);
  }

  // Merges further memberships into an existing edge.
  tagEdge(parentId: number, childId: number, types: readonly StructureType[], headIds: HeadIds): boolean {
    const record = this.getEdge(parentId, childId);
    const memberships = collectMemberships(types, headIds);
    if (!record || !memberships) {
      return false;
    }
    for (const [type, headId] of memberships) {
      record.memberships.set(type, headId);
      this.nodes.get(parentId)?.nodeTypes.add(type);
      this.nodes.get(childId)?.nodeTypes.add(type);
    }
    return true;
  }

  // Drops the given memberships (all of them when `types` is omitted); an
  // edge left without memberships is removed together with the back-reference.
  removeChild(parentId: number, childId: number, types?: readonly StructureType[]): boolean {
    const parent = this.nodes.get(parentId);
    const child = this.nodes.get(childId);
    if (!parent || !child) {
      return false;
    }
    const idx = parent.children.findIndex((record) => record.childId === childId);
    const record = parent.children[idx];
    if (!record) {
      return false;
    }

    // False when the edge carries none of the named types.
    let dropped = 0;
    for (const type of types ?? [...record.memberships.keys()]) {
      if (record.memberships.delete(type)) dropped += 1;
    }
    if (dropped === 0) {
      return false;
    }

    if (record.memberships.size === 0) {
      parent.children.splice(idx, 1);
      removeFirst(child.parentIds, parentId);
    }
    return true;
  }

  getEdge(parentId: number, childId: number): ChildRecord | undefined {
    return this.nodes.get(parentId)?.children.find((record) => record.childId === childId);
  }

  edges(): StructureEdge[] {
    const result: StructureEdge[] = [];
    for (const node of this.nodes.values()) {
      for (const record of node.children) {
        result.push({ parentId: node.id, childId: record.childId, memberships: record.memberships });
      }
    }
    return result;
  }

  getChildren(id: number, type?: StructureType, headId?: number): number[] {
    const node = this.nodes.get(id);
    if (!node) {
      return [];
    }
    return node.children
      .filter((record) => matches(record, type, headId))
      .map((record) => record.childId);
  }

  getParents(id: number): number[] {
    return [...(this.nodes.get(id)?.parentIds ?? [])];
  }

  getParent(id: number, type?: StructureType, headId?: number): number | undefined {
    const node = this.nodes.get(id);
    if (!node) {
      return undefined;
    }
    return node.parentIds.find((parentId) => {
      const record = this.getEdge(parentId, id);
      return record !== undefined && matches(record, type, headId);
    });
  }

  setHead(id: number, type: StructureType, isHead = true): void {
    const node = this.nodes.get(id);
    if (!node) return;
    if (isHead) {
      node.heads.add(type);
      node.nodeTypes.add(type);
    } else {
      node.heads.delete(type);
    }
  }

  isHead(id: number, type: StructureType): boolean {
    return this.nodes.get(id)?.heads.has(type) ?? false;
  }

  isLeaf(id: number, type?: StructureType, headId?: number): boolean {
    return this.getChildren(id, type, headId).length === 0;
  }

  canAcceptMoreChildren(id: number): boolean {
    const node = this.nodes.get(id);
    return node !== undefined && node.children.length < node.maxChildren;
  }

  // Neighbours reachable over edges that belong to (type, headId), in both directions.
  structuralNeighbours(id: number, type: StructureType, headId: number): number[] {
    const node = this.nodes.get(id);
    if (!node) {
      return [];
    }
    const neighbours: number[] = [];
    for (const parentId of node.parentIds) {
      const record = this.getEdge(parentId, id);
      if (record && belongsToStructure(record, type, headId)) neighbours.push(parentId);
    }
    for (const record of node.children) {
      if (belongsToStructure(record, type, headId)) neighbours.push(record.childId);
    }
    return neighbours;
  }

  degree(id: number, type: StructureType, headId: number): number {
    return this.structuralNeighbours(id, type, headId).length;
  }

  // Substructure of `startId` under (type, headId). A node that is head of a
  // different region for the same type is included but not expanded.
  getAllNodesInStructure(startId: number, type: StructureType, headId: number): Set<number> {
    const result = new Set<number>();
    if (!this.nodes.has(startId)) {
      return result;
    }
    const stack = [startId];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (result.has(current)) continue;
      result.add(current);

      if (current !== startId && current !== headId && this.isHead(current, type)) continue;

      for (const neighbour of this.structuralNeighbours(current, type, headId)) {
        if (!result.has(neighbour)) stack.push(neighbour);
      }
    }
    return result;
  }

  isEndpoint(id: number, type: StructureType, headId: number): boolean {
    return this.degree(id, type, headId) === 1;
  }

  getEndpointsOfStructure(startId: number, type: StructureType, headId: number): Set<number> {
    const endpoints = new Set<number>();
    for (const id of this.getAllNodesInStructure(startId, type, headId)) {
      if (this.isEndpoint(id, type, headId)) endpoints.add(id);
    }
    return endpoints;
  }

  // True only for a single closed chain: every node has exactly one child in
  // the set and following children from the head returns to it after
  // visiting all |nodes| nodes.
  hasClosedCycle(nodes: ReadonlySet<number>, type: StructureType, headId: number): boolean {
    if (nodes.size === 0) {
      return false;
    }
    for (const id of nodes) {
      if (this.getChildren(id, type, headId).length !== 1) return false;
    }

    const first = nodes.values().next().value;
    const start = nodes.has(headId) ? headId : first;
    if (start === undefined) {
      return false;
    }
    const visited = new Set<number>();
    let current = start;
    while (!visited.has(current)) {
      visited.add(current);
      const next = this.getChildren(current, type, headId)[0];
      if (next === undefined || !nodes.has(next)) return false;
      current = next;
    }
    return current === start && visited.size === nodes.size;
  }

  // Directed cycle detection over child edges restricted to `nodes`.
  hasDirectedCycle(nodes: ReadonlySet<number>, type: StructureType, headId: number): boolean {
    const state = new Map<number, 'visiting' | 'done'>();
    for (const root of nodes) {
      if (state.has(root)) continue;
      const stack: Array<{ id: number; expanded: boolean }> = [{ id: root, expanded: false }];
      while (stack.length > 0) {
        const entry = stack.pop();
        if (!entry) break;
        if (entry.expanded) {
          state.set(entry.id, 'done');
          continue;
        }
        if (state.has(entry.id)) continue;

        state.set(entry.id, 'visiting');
        stack.push({ id: entry.id, expanded: true });
        for (const child of this.getChildren(entry.id, type, headId)) {
          if (!nodes.has(child)) continue;
          const childState = state.get(child);
          if (childState === 'visiting') return true;
          if (childState === undefined) stack.push({ id: child, expanded: false });
        }
      }
    }
    return false;
  }

  // Nearest node marked head for `type` walking up through parents; falls back
  // to the structural root when no head exists on the way.
  findHead(startId: number, type: StructureType): number | undefined {
    if (!this.nodes.has(startId)) {
      return undefined;
    }
    const visited = new Set<number>();
    const queue = [startId];
    let root: number | undefined;
    for (let i = 0; i < queue.length; i += 1) {
      const current = queue[i];
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);

      if (this.isHead(current, type)) return current;

      const parents = this.getParents(current);
      if (parents.length === 0 && root === undefined) root = current;
      for (const parentId of parents) {
        if (!visited.has(parentId)) queue.push(parentId);
      }
    }
    return root;
  }

  isConnected(nodes: ReadonlySet<number>, type?: StructureType, headId?: number): boolean {
    const start = nodes.values().next().value;
    if (start === undefined) {
      return false;
    }
    const visited = new Set<number>([start]);
    const queue = [start];
    for (let i = 0; i < queue.length; i += 1) {
      const current = queue[i];
      if (current === undefined) continue;
      const neighbours =
        type !== undefined && headId !== undefined
          ? this.structuralNeighbours(current, type, headId)
          : [...this.getParents(current), ...this.getChildren(current)];
      for (const neighbour of neighbours) {
        if (nodes.has(neighbour) && !visited.has(neighbour)) {
          visited.add(neighbour);
          queue.push(neighbour);
        }
      }
    }
    return visited.size === nodes.size;
  }

  countEdges(nodes: ReadonlySet<number>, type: StructureType, headId: number): number {
    let count = 0;
    for (const id of nodes) {
      for (const child of this.getChildren(id, type, headId)) {
        if (nodes.has(child)) count += 1;
      }
    }
    return count;
  }

  // Edges of any membership at `nodeId` whose other end lies outside `members`.
  countEdgeLinks(nodeId: number, members: ReadonlySet<number>): number {
    const outside = new Set<number>();
    for (const neighbour of [...this.getParents(nodeId), ...this.getChildren(nodeId)]) {
      if (!members.has(neighbour)) outside.add(neighbour);
    }
    return outside.size;
  }

  getPathFromHead(id: number, type: StructureType, headId: number): number[] {
    if (!this.nodes.has(id) || !this.nodes.has(headId)) {
      return [id];
    }
    const previous = new Map<number, number | undefined>([[headId, undefined]]);
    const queue = [headId];
    for (let i = 0; i < queue.length; i += 1) {
      const current = queue[i];
      if (current === undefined) continue;
      if (current === id) {
        const path: number[] = [];
        let step: number | undefined = id;
        while (step !== undefined) {
          path.unshift(step);
          step = previous.get(step);
        }
        return path;
      }
      for (const neighbour of this.structuralNeighbours(current, type, headId)) {
        if (!previous.has(neighbour)) {
          previous.set(neighbour, current);
          queue.push(neighbour);
        }
      }
    }
    return [id];
  }

  getDescendantCount(id: number): number {
    const descendants = new Set<number>();
    const stack = this.getChildren(id);
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current === id || descendants.has(current)) continue;
      descendants.add(current);
      stack.push(...this.getChildren(current));
    }
    return descendants.size;
  }

  clone(): StructureGraph {
    const copy = new StructureGraph();
    for (const node of this.nodes.values()) {
      copy.nodes.set(node.id, copyStructureNode(node));
    }
    return copy;
  }
}

function matches(record: ChildRecord, type: StructureType | undefined, headId: number | undefined): boolean {
  if (type === undefined) return true;
  if (headId === undefined) return record.memberships.has(type);
  return belongsToStructure(record, type, headId);
}

function collectMemberships(types: readonly StructureType[], headIds: HeadIds): Map<StructureType, number> | undefined {
  const memberships = new Map<StructureType, number>();
  for (const type of types) {
    const headId = headIds[type];
    if (headId === undefined) return undefined;
    memberships.set(type, headId);
  }
  return memberships;
}

function removeFirst(values: number[], value: number): void {
  const idx = values.indexOf(value);
  if (idx >= 0) values.splice(idx, 1);
}
