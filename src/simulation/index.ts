export type * from './types/simulation';
export { ConfigError } from './types/errors';
export { loadSimProps, parseSimProps, readIntProp, readOptionalIntProp, readStringProp } from './config/props';
export { createLogger, type Logger, type LogLevel } from './utils/logger';
export { IdGenerator } from './utils/id';
export { SeededRandom } from './utils/random';

export { StructureGraph, type StructureEdge, type HeadIds } from './structure/StructureGraph';
export type { StructureNode, ChildRecord } from './structure/StructureNode';
export * from './nodes/topologyRules';
export { MirrorStructure, type MirrorLookup } from './nodes/MirrorStructure';

export { Mirror } from './network/Mirror';
export { Link } from './network/Link';
export { Network, type NetworkOptions } from './network/Network';
export type { ManagedNetwork, TopologyHost } from './network/contracts';

export { TopologyStrategy } from './strategies/TopologyStrategy';
export { BuildAsSubstructure } from './strategies/BuildAsSubstructure';
export * from './strategies/planning';
export { BalancedTreeTopologyStrategy } from './strategies/BalancedTreeTopologyStrategy';
export { DepthLimitedTreeTopologyStrategy } from './strategies/DepthLimitedTreeTopologyStrategy';
export { RingTopologyStrategy } from './strategies/RingTopologyStrategy';
export { LineTopologyStrategy } from './strategies/LineTopologyStrategy';
export { StarTopologyStrategy } from './strategies/StarTopologyStrategy';
export { FullyConnectedTopology } from './strategies/FullyConnectedTopology';
export { NConnectedTopology } from './strategies/NConnectedTopology';
export { SnowflakeTopologyStrategy } from './strategies/SnowflakeTopologyStrategy';
export { createTopologyStrategy, isTopologyKind, type StrategyOptions } from './strategies/createTopologyStrategy';

export { Action, MirrorChange, TargetLinkChange, TopologyChange, type ReconfigurationAction } from './effectors/Action';
export { Effect } from './effectors/Effect';
export { Effector } from './effectors/Effector';

export { EventCollector } from './engine/EventCollector';
export { MetricsAggregator } from './engine/MetricsAggregator';
export { MirrorProbe, LinkProbe, type Probe } from './engine/probes';
export { Simulator } from './engine/Simulator';
