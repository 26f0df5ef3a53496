import type { SimProps } from '../types/simulation';
import type { TopologyStrategy } from '../strategies/TopologyStrategy';
import type { Link } from './Link';
import type { Mirror } from './Mirror';

// What the scheduler and the prediction model may ask of a network.
export interface ManagedNetwork {
  getTopologyStrategy(): TopologyStrategy;
  getNumMirrors(): number;
  getNumTargetMirrors(): number;
  getNumTargetLinksPerMirror(): number;
  setNumMirrors(numMirrors: number, simTime: number): number;
  setTopologyStrategy(strategy: TopologyStrategy, simTime: number): void;
  setNumTargetedLinksPerMirror(linksPerMirror: number, simTime: number): void;
  getMirrors(): Mirror[];
  getLinks(): Link[];
  getBandwidthHistory(): ReadonlyMap<number, number>;
  getTtwHistory(): ReadonlyMap<number, number>;
  getPredictedBandwidth(simTime: number): number;
  getProps(): SimProps;
  getCurrentTimeStep(): number;
}

// The execution side of a topology strategy: the only way a strategy touches
// mirrors and links.
export interface TopologyHost {
  getMirrors(): Mirror[];
  getMirror(id: number): Mirror | undefined;
  getNumTargetLinksPerMirror(): number;
  createMirror(simTime: number): Mirror;
  shutdownMirror(id: number, simTime: number): boolean;
  connect(sourceId: number, targetId: number, simTime: number): Link | undefined;
  disconnect(sourceId: number, targetId: number, simTime: number): number;
  closeAllLinks(simTime: number): number;
}
