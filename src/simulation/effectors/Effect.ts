import type { SimProps, TopologyKind } from '../types/simulation';
import { averageOfRange, readIntProp } from '../config/props';
import type { ReconfigurationAction } from './Action';

// Predicted impact of one Action, computed on demand from the network's
// current state. Nothing here mutates the network.
//
// Transitions the model does not cover yield 0 rather than a guess; the same
// holds for every formula whose denominator would be zero.
export class Effect {
  constructor(readonly action: ReconfigurationAction) {}

  // Relative change of the active-link ratio (positive = gain).
  getDeltaActiveLinks(): number {
    const { action } = this;
    const network = action.network;
    const topology = network.getTopologyStrategy().kind;
    const m = network.getNumMirrors();
    const lpm = network.getNumTargetLinksPerMirror();

    switch (action.kind) {
      case 'mirror_change':
        return negate(mirrorChangeRatio(topology, m, action.newMirrors, lpm));
      case 'target_link_change':
        return negate(targetLinkChangeRatio(topology, m, lpm, action.newLinksPerMirror));
      case 'topology_change':
        return negate(topologyChangeRatio(topology, action.newTopology.kind, m, lpm));
    }
  }

  // Change of relative bandwidth in percent points (positive = reduction).
  getDeltaBandwidth(props: SimProps = this.action.network.getProps()): number {
    const { action } = this;
    const network = action.network;
    const current = network.getBandwidthHistory().get(network.getCurrentTimeStep()) ?? 0;
    const maxBandwidthPerLink = readIntProp(props, 'max_bandwidth');
    const predictedMax = network.getTopologyStrategy().getPredictedNumTargetLinks(action) * maxBandwidthPerLink;
    if (predictedMax <= 0) {
      return 0;
    }
    const predicted = network.getPredictedBandwidth(action.time + this.getLatency() - 1);
    return current - Math.trunc((100 * predicted) / predictedMax);
  }

  // Change of relative time-to-write in percent points. Only fully connected
  // and balanced tree targets are modelled.
  getDeltaTimeToWrite(): number {
    const { action } = this;
    const network = action.network;
    const current = network.getTtwHistory().get(network.getCurrentTimeStep()) ?? 0;
    const topology = network.getTopologyStrategy().kind;
    let m = network.getNumTargetMirrors();
    let lpm = network.getNumTargetLinksPerMirror();

    if (action.kind === 'topology_change') {
      const target = action.newTopology.kind;
      if (target === 'fully_connected') return 100 - current;
      if (target === 'balanced_tree') return balancedTreeTtwDelta(m, current, lpm);
      return 0;
    }
    if (topology === 'fully_connected') {
      return 100 - current;
    }
    if (topology !== 'balanced_tree') {
      return 0;
    }
    if (action.kind === 'mirror_change') {
      m = action.newMirrors;
    } else {
      lpm = action.newLinksPerMirror;
    }
    return balancedTreeTtwDelta(m, current, lpm);
  }

  // Ticks until the change has fully taken effect.
  getLatency(): number {
    const { action } = this;
    const props = action.network.getProps();
    let time = 0;
    if (action.kind === 'mirror_change') {
      if (action.newMirrors > action.network.getNumTargetMirrors()) {
        time = Math.round(
          averageOfRange(props, 'startup_time_min', 'startup_time_max') +
            averageOfRange(props, 'ready_time_min', 'ready_time_max') +
            averageOfRange(props, 'link_activation_time_min', 'link_activation_time_max'),
        );
      }
    } else {
      time = Math.round(averageOfRange(props, 'link_activation_time_min', 'link_activation_time_max'));
    }
    return Math.max(0, time);
  }
}

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

function mirrorChangeRatio(topology: TopologyKind, m1: number, m2: number, lpm: number): number {
  if (topology === 'fully_connected') return 0;
  if (topology === 'n_connected') return ratio(2 * lpm * (m2 - m1), (m1 - 1) * (m2 - 1));
  return ratio(2 * (m2 - m1), m1 * m2);
}

function targetLinkChangeRatio(topology: TopologyKind, m: number, lpm1: number, lpm2: number): number {
  if (topology === 'n_connected') return ratio(2 * (lpm1 - lpm2), m - 1);
  return 0;
}

function topologyChangeRatio(from: TopologyKind, to: TopologyKind, m: number, lpm: number): number {
  if (from === 'fully_connected' && to === 'n_connected') {
    return ratio(2 * lpm, m - 1);
  }
  if (from === 'fully_connected' && to === 'balanced_tree') {
    return m === 0 ? 0 : 1 - 2 / m;
  }
  if (from === 'n_connected' && to === 'fully_connected') {
    return m - 1 === 0 ? 0 : (2 * lpm) / (m - 1) - 1;
  }
  if (from === 'n_connected' && to === 'balanced_tree') {
    return ratio(2 * m * (1 - lpm) - 2, m * m - m);
  }
  if (from === 'balanced_tree' && to === 'fully_connected') {
    return m === 0 ? 0 : 2 / m - 1;
  }
  if (from === 'balanced_tree' && to === 'n_connected') {
    return ratio(2 * m * (lpm - 1) + 2, m * m - m);
  }
  return 0;
}

// depth ≈ round(log((m + 1) / 2) / log(lpm)) against a worst case of round(m / 2) hops.
function balancedTreeTtwDelta(m: number, currentTtw: number, lpm: number): number {
  const maxTtw = Math.round(m / 2);
  if (maxTtw === 1) {
    return 100 - currentTtw;
  }
  if (lpm < 2 || maxTtw < 1) {
    return 0;
  }
  const depth = Math.round(Math.log((m + 1) / 2) / Math.log(lpm));
  return currentTtw - (100 - Math.trunc((100 * (depth - 1)) / (maxTtw - 1)));
}
