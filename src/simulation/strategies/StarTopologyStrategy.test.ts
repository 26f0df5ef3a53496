import { describe, expect, it } from 'vitest';

import { makeNetwork, starGraph } from '../__tests__/fixtures';
import { starLeaves } from '../nodes/topologyRules';
import { StarTopologyStrategy } from './StarTopologyStrategy';

describe('StarTopologyStrategy', () => {
  it('links every leaf to the center', () => {
    const strategy = new StarTopologyStrategy();
    const network = makeNetwork(strategy, 5);

    expect(starLeaves(strategy.getStructure(), 0)).toEqual([1, 2, 3, 4]);
    expect(network.getNumLinks()).toBe(4);
    expect(strategy.computeTargetLinks(5)).toBe(4);
    expect(strategy.computeTargetLinks(2)).toBe(0);
  });

  it('drops the latest leaves first and keeps two', () => {
    expect(new StarTopologyStrategy().removeNodesFromStructure(starGraph(5), 5)).toEqual([4, 3]);
  });

  it('shuts down only the mirrors it gave up', () => {
    const strategy = new StarTopologyStrategy();
    const network = makeNetwork(strategy, 5);

    expect(network.setNumMirrors(2, 1)).toBe(2);
    expect(network.getNumMirrors()).toBe(3);
    expect(network.getNumLinks()).toBe(2);
  });

  it('leaves two mirrors unlinked', () => {
    const strategy = new StarTopologyStrategy();
    const network = makeNetwork(strategy, 2);

    expect(strategy.getStructure().size).toBe(0);
    expect(network.getNumLinks()).toBe(0);
  });
});
