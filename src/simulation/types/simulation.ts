export type StructureType =
  | 'default'
  | 'mirror'
  | 'tree'
  | 'ring'
  | 'line'
  | 'star'
  | 'fully_connected'
  | 'n_connected';

export type TopologyKind =
  | 'balanced_tree'
  | 'depth_limited_tree'
  | 'ring'
  | 'line'
  | 'star'
  | 'fully_connected'
  | 'n_connected'
  | 'snowflake';

export type MirrorState = 'starting' | 'up' | 'ready' | 'stopped';

export type LinkState = 'inactive' | 'active' | 'closed';

// Parsed KEY=value simulation properties.
export type SimProps = Readonly<Record<string, string>>;

export interface MirrorPair {
  sourceId: number;
  targetId: number;
}

export interface SimEvent {
  id: string;
  timestamp: number;
  type:
    | 'mirror_added'
    | 'mirror_stopped'
    | 'link_created'
    | 'link_activated'
    | 'link_closed'
    | 'topology_changed'
    | 'action_applied';
  mirrorId?: number;
  linkId?: number;
  detail?: string;
}

export interface NetworkSnapshot {
  timeStep: number;
  topology: TopologyKind;
  numMirrors: number;
  numReadyMirrors: number;
  numTargetMirrors: number;
  numLinks: number;
  numActiveLinks: number;
  numTargetLinks: number;
  bandwidthUsed: number;
  relativeBandwidth: number;
  relativeTtw: number;
  relativeActiveLinks: number;
}
