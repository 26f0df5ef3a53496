import type { NetworkSnapshot } from '../types/simulation';
import type { Network } from '../network/Network';

export class MetricsAggregator {
  // Reads the histories recorded for `timeStep`; ticks that were never
  // recorded report 0.
  computeSnapshot(params: { network: Network; timeStep: number }): NetworkSnapshot {
    const { network, timeStep } = params;

    return {
      timeStep,
      topology: network.getTopologyStrategy().kind,
      numMirrors: network.getNumMirrors(),
      numReadyMirrors: network.getNumReadyMirrors(),
      numTargetMirrors: network.getNumTargetMirrors(),
      numLinks: network.getNumLinks(),
      numActiveLinks: network.getNumActiveLinks(),
      numTargetLinks: network.getNumTargetLinks(),
      bandwidthUsed: network.getBandwidthUsed(),
      relativeBandwidth: network.getBandwidthHistory().get(timeStep) ?? 0,
      relativeTtw: network.getTtwHistory().get(timeStep) ?? 0,
      relativeActiveLinks: network.getActiveLinksHistory().get(timeStep) ?? 0,
    };
  }
}
