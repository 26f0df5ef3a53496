import type { TopologyKind } from '../types/simulation';
import type { ManagedNetwork, TopologyHost } from '../network/contracts';
import type { ReconfigurationAction } from '../effectors/Action';

// Contract every topology offers the network: lay links over a mirror
// population and keep them laid while it grows and shrinks.
export abstract class TopologyStrategy {
  abstract readonly kind: TopologyKind;

  // Closed-form link count of this topology for m mirrors.
  abstract computeTargetLinks(numMirrors: number, linksPerMirror: number): number;

  abstract initNetwork(host: TopologyHost, simTime: number): void;

  abstract restartNetwork(host: TopologyHost, simTime: number): void;

  // Both return how many mirrors were actually added or removed.
  abstract handleAddNewMirrors(host: TopologyHost, count: number, simTime: number): number;

  abstract handleRemoveMirrors(host: TopologyHost, count: number, simTime: number): number;

  getNumTargetLinks(network: ManagedNetwork): number {
    return this.computeTargetLinks(network.getNumMirrors(), network.getNumTargetLinksPerMirror());
  }

  getPredictedNumTargetLinks(action: ReconfigurationAction): number {
    const m = action.network.getNumMirrors();
    const lpm = action.network.getNumTargetLinksPerMirror();
    switch (action.kind) {
      case 'mirror_change':
        return this.computeTargetLinks(action.newMirrors, lpm);
      case 'target_link_change':
        return this.computeTargetLinks(m, action.newLinksPerMirror);
      case 'topology_change':
        return action.newTopology.computeTargetLinks(m, lpm);
    }
  }

  toString(): string {
    return this.kind;
  }
}
