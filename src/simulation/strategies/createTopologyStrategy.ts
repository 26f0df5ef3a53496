import type { TopologyKind } from '../types/simulation';
import { BalancedTreeTopologyStrategy } from './BalancedTreeTopologyStrategy';
import { DepthLimitedTreeTopologyStrategy } from './DepthLimitedTreeTopologyStrategy';
import { FullyConnectedTopology } from './FullyConnectedTopology';
import { LineTopologyStrategy } from './LineTopologyStrategy';
import { NConnectedTopology } from './NConnectedTopology';
import { RingTopologyStrategy } from './RingTopologyStrategy';
import { SnowflakeTopologyStrategy } from './SnowflakeTopologyStrategy';
import { StarTopologyStrategy } from './StarTopologyStrategy';
import type { TopologyStrategy } from './TopologyStrategy';

export interface StrategyOptions {
  minRingSize?: number;
  maxDepth?: number;
  ringSize?: number;
}

const TOPOLOGY_KINDS: readonly TopologyKind[] = [
  'balanced_tree',
  'depth_limited_tree',
  'ring',
  'line',
  'star',
  'fully_connected',
  'n_connected',
  'snowflake',
];

export function isTopologyKind(value: string): value is TopologyKind {
  return TOPOLOGY_KINDS.some((kind) => kind === value);
}

export function createTopologyStrategy(name: string, options: StrategyOptions = {}): TopologyStrategy {
  const kind = name.trim().toLowerCase();
  if (!isTopologyKind(kind)) {
    throw new Error(`Unknown topology "${name}". Expected one of ${TOPOLOGY_KINDS.join(', ')}`);
  }

  switch (kind) {
    case 'balanced_tree':
      return new BalancedTreeTopologyStrategy();
    case 'depth_limited_tree':
      return new DepthLimitedTreeTopologyStrategy(options.maxDepth);
    case 'ring':
      return new RingTopologyStrategy(options.minRingSize);
    case 'line':
      return new LineTopologyStrategy();
    case 'star':
      return new StarTopologyStrategy();
    case 'fully_connected':
      return new FullyConnectedTopology();
    case 'n_connected':
      return new NConnectedTopology();
    case 'snowflake':
      return new SnowflakeTopologyStrategy(options.ringSize);
  }
}
