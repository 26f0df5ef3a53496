import type { SimProps } from '../types/simulation';
import type { ManagedNetwork } from '../network/contracts';
import { Network } from '../network/Network';
import { StructureGraph } from '../structure/StructureGraph';
import { BalancedTreeTopologyStrategy } from '../strategies/BalancedTreeTopologyStrategy';
import type { TopologyStrategy } from '../strategies/TopologyStrategy';

// Fixed durations so every mirror is ready at t=2 and every link active one
// tick after both ends are ready.
export const TEST_PROPS: SimProps = {
  seed: '42',
  max_bandwidth: '10',
  startup_time_min: '1',
  startup_time_max: '1',
  ready_time_min: '1',
  ready_time_max: '1',
  link_activation_time_min: '1',
  link_activation_time_max: '1',
};

export function makeNetwork(
  strategy: TopologyStrategy,
  numMirrors: number,
  linksPerMirror = 2,
  props: SimProps = TEST_PROPS,
): Network {
  return new Network({ strategy, numMirrors, linksPerMirror, props });
}

// Four mirrors in a balanced tree with two links per mirror and no history.
export function fakeNetwork(overrides: Partial<ManagedNetwork> = {}): ManagedNetwork {
  const strategy = new BalancedTreeTopologyStrategy();
  return {
    getTopologyStrategy: () => strategy,
    getNumMirrors: () => 4,
    getNumTargetMirrors: () => 4,
    getNumTargetLinksPerMirror: () => 2,
    setNumMirrors: () => 0,
    setTopologyStrategy: () => undefined,
    setNumTargetedLinksPerMirror: () => undefined,
    getMirrors: () => [],
    getLinks: () => [],
    getBandwidthHistory: () => new Map<number, number>(),
    getTtwHistory: () => new Map<number, number>(),
    getPredictedBandwidth: () => 0,
    getProps: () => TEST_PROPS,
    getCurrentTimeStep: () => 0,
    ...overrides,
  };
}

export function range(start: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i);
}

// Nodes 0..n-1 linked into a ring 0 → 1 → … → n-1 → 0 headed by 0.
export function ringGraph(size: number): StructureGraph {
  const graph = new StructureGraph();
  for (const id of range(0, size)) graph.addNode(id, { kind: 'ring' });
  graph.setHead(0, 'ring');
  for (const id of range(0, size)) graph.link(id, (id + 1) % size, 'ring', 0);
  return graph;
}

// Nodes 0..n-1 linked into a line 0 → 1 → … → n-1 headed by 0.
export function lineGraph(size: number): StructureGraph {
  const graph = new StructureGraph();
  for (const id of range(0, size)) graph.addNode(id, { kind: 'line' });
  graph.setHead(0, 'line');
  for (const id of range(1, size - 1)) graph.link(id - 1, id, 'line', 0);
  return graph;
}

// Center 0 with leaves 1..n-1.
export function starGraph(size: number): StructureGraph {
  const graph = new StructureGraph();
  for (const id of range(0, size)) graph.addNode(id, { kind: 'star' });
  graph.setHead(0, 'star');
  for (const id of range(1, size - 1)) graph.link(0, id, 'star', 0);
  return graph;
}
