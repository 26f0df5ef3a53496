import { describe, expect, it } from 'vitest';

import { makeNetwork } from '../__tests__/fixtures';
import { SeededRandom } from '../utils/random';
import { BalancedTreeTopologyStrategy } from './BalancedTreeTopologyStrategy';
import type { BuildAsSubstructure } from './BuildAsSubstructure';
import { DepthLimitedTreeTopologyStrategy } from './DepthLimitedTreeTopologyStrategy';
import { FullyConnectedTopology } from './FullyConnectedTopology';
import { LineTopologyStrategy } from './LineTopologyStrategy';
import { NConnectedTopology } from './NConnectedTopology';
import { RingTopologyStrategy } from './RingTopologyStrategy';
import { SnowflakeTopologyStrategy } from './SnowflakeTopologyStrategy';
import { StarTopologyStrategy } from './StarTopologyStrategy';

// Name, factory and smallest starting population.
const factories: Array<[string, () => BuildAsSubstructure, number]> = [
  ['balanced_tree', () => new BalancedTreeTopologyStrategy(), 3],
  ['depth_limited_tree', () => new DepthLimitedTreeTopologyStrategy(2), 3],
  ['ring', () => new RingTopologyStrategy(), 3],
  ['line', () => new LineTopologyStrategy(), 3],
  ['star', () => new StarTopologyStrategy(), 3],
  ['fully_connected', () => new FullyConnectedTopology(), 3],
  ['n_connected', () => new NConnectedTopology(), 3],
  ['snowflake', () => new SnowflakeTopologyStrategy(), 9],
];

describe.each(factories)('%s under random growth and shrinkage', (_name, create, minStart) => {
  it.each([1, 2, 3, 4, 5])('stays valid and fully linked with seed %i', (seed) => {
    const rng = new SeededRandom(seed);
    const strategy = create();
    const network = makeNetwork(strategy, rng.nextInt(minStart, minStart + 7));

    for (let t = 1; t <= 20; t += 1) {
      const delta = rng.nextInt(1, 5);
      const target = rng.nextInt(0, 1) === 0 ? network.getNumMirrors() + delta : network.getNumMirrors() - delta;
      network.setNumMirrors(target, t);

      const graph = strategy.getStructure();
      const headId = strategy.findStructureHead();
      expect(headId).toBeDefined();
      if (headId === undefined) return;

      expect(strategy.validateStructure(graph)).toBe(true);
      expect(graph.size).toBe(network.getNumMirrors());
      expect(network.getNumLinks()).toBe(graph.edges().length);
      expect(network.getNumLinks()).toBe(network.getNumTargetLinks());
      expect(strategy.getMirrorStructure(network).isValidStructure(strategy.structureType, headId)).toBe(true);
    }
  });
});
