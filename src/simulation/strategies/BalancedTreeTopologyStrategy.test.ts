import { describe, expect, it } from 'vitest';

import { makeNetwork, range } from '../__tests__/fixtures';
import { StructureGraph } from '../structure/StructureGraph';
import { BalancedTreeTopologyStrategy, deepestLeaf, treeLevels } from './BalancedTreeTopologyStrategy';
import { DepthLimitedTreeTopologyStrategy } from './DepthLimitedTreeTopologyStrategy';
import { planTopologyChange } from './planning';

describe('BalancedTreeTopologyStrategy', () => {
  it('needs one link less than it has mirrors', () => {
    const strategy = new BalancedTreeTopologyStrategy();

    expect(strategy.computeTargetLinks(7)).toBe(6);
    expect(strategy.computeTargetLinks(1)).toBe(0);
    expect(strategy.computeTargetLinks(0)).toBe(0);
  });

  it('fills each level before going deeper', () => {
    const strategy = new BalancedTreeTopologyStrategy();
    const network = makeNetwork(strategy, 7);
    const graph = strategy.getStructure();

    expect(graph.getChildren(0, 'tree', 0)).toEqual([1, 2]);
    expect(graph.getChildren(1, 'tree', 0)).toEqual([3, 4]);
    expect(graph.getChildren(2, 'tree', 0)).toEqual([5, 6]);
    expect(network.getNumLinks()).toBe(6);
  });

  it('fans out as far as links per mirror allows', () => {
    const strategy = new BalancedTreeTopologyStrategy();
    makeNetwork(strategy, 4, 3);

    expect(strategy.getStructure().getChildren(0, 'tree', 0)).toEqual([1, 2, 3]);
  });

  it('removes the deepest leaves and refills the gaps', () => {
    const strategy = new BalancedTreeTopologyStrategy();
    const network = makeNetwork(strategy, 7);

    expect(network.setNumMirrors(5, 1)).toBe(2);
    expect(strategy.getStructure().nodeIds().sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4]);
    expect(network.getNumLinks()).toBe(4);

    // Mirrors 0..6 and links 7..12 used the first ids.
    expect(network.setNumMirrors(8, 2)).toBe(3);
    const graph = strategy.getStructure();
    expect(graph.getChildren(2, 'tree', 0)).toEqual([13, 14]);
    expect(graph.getParent(15)).toBe(3);
    expect(network.getNumLinks()).toBe(7);
    expect(strategy.validateStructure(graph)).toBe(true);
  });

  it('never removes the root', () => {
    const strategy = new BalancedTreeTopologyStrategy();
    const network = makeNetwork(strategy, 3);

    expect(network.setNumMirrors(0, 1)).toBe(2);
    expect(strategy.getStructure().nodeIds()).toEqual([0]);
    expect(network.getNumLinks()).toBe(0);
  });
});

describe('tree helpers', () => {
  it('lists nodes level by level and picks the deepest leaf', () => {
    const graph = new StructureGraph();
    for (const id of range(0, 5)) graph.addNode(id);
    graph.setHead(0, 'tree');
    graph.link(0, 1, 'tree', 0);
    graph.link(0, 2, 'tree', 0);
    graph.link(2, 3, 'tree', 0);
    graph.link(2, 4, 'tree', 0);

    expect(treeLevels(graph, 0)).toEqual([
      { id: 0, depth: 0 },
      { id: 1, depth: 1 },
      { id: 2, depth: 1 },
      { id: 3, depth: 2 },
      { id: 4, depth: 2 },
    ]);
    expect(deepestLeaf(graph, 0)).toBe(4);
  });
});

describe('DepthLimitedTreeTopologyStrategy', () => {
  it('hangs new nodes below the deepest node above the limit', () => {
    const strategy = new DepthLimitedTreeTopologyStrategy(2);
    const plan = planTopologyChange(strategy, new StructureGraph(), { kind: 'build', nodeIds: range(0, 6) }, {
      linksPerMirror: 2,
    });

    expect(plan.valid).toBe(true);
    expect(plan.graph.getChildren(0, 'tree', 0)).toEqual([1]);
    expect(plan.graph.getChildren(1, 'tree', 0)).toEqual([2, 3, 4, 5]);
    expect(Math.max(...treeLevels(plan.graph, 0).map((entry) => entry.depth))).toBe(2);
  });

  it('defaults to depth three and rejects a bad limit', () => {
    expect(new DepthLimitedTreeTopologyStrategy().maxDepth).toBe(3);
    expect(() => new DepthLimitedTreeTopologyStrategy(0)).toThrow(RangeError);
    expect(() => new DepthLimitedTreeTopologyStrategy(1.5)).toThrow(RangeError);
  });
});
