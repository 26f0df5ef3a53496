import type { NetworkSnapshot } from '../types/simulation';
import type { Network } from '../network/Network';
import { Effector } from '../effectors/Effector';
import { createLogger } from '../utils/logger';
import { MetricsAggregator } from './MetricsAggregator';
import type { Probe } from './probes';

const logger = createLogger('simulator');

// Synchronous tick driver. Each step advances the network, applies due
// actions, records quality and publishes a snapshot.
export class Simulator {
  readonly effector: Effector;

  private readonly aggregator = new MetricsAggregator();

  private readonly probes: Probe[] = [];

  private readonly callbacks: Array<(snapshot: NetworkSnapshot) => void> = [];

  private timeStep = 0;

  constructor(
    readonly network: Network,
    effector?: Effector,
  ) {
    this.effector = effector ?? new Effector(network, network.getIdGenerator());
  }

  registerProbe(probe: Probe): void {
    this.probes.push(probe);
  }

  onSnapshot(cb: (snapshot: NetworkSnapshot) => void): void {
    this.callbacks.push(cb);
  }

  getTimeStep(): number {
    return this.timeStep;
  }

  step(): NetworkSnapshot {
    this.timeStep += 1;
    const t = this.timeStep;

    this.network.timeStep(t);
    const collector = this.network.getEventCollector();
    for (const action of this.effector.timeStep(t)) {
      collector.recordEvent({ type: 'action_applied', detail: `${action.kind}#${action.id}` });
    }
    this.network.recordQuality(t);

    const snapshot = this.getSnapshot();
    for (const probe of this.probes) {
      probe.update(snapshot);
    }
    for (const cb of this.callbacks) {
      cb(snapshot);
    }
    logger.debug(`t=${t} mirrors=${snapshot.numMirrors} links=${snapshot.numActiveLinks}/${snapshot.numLinks}`);
    return snapshot;
  }

  run(ticks: number): NetworkSnapshot[] {
    const snapshots: NetworkSnapshot[] = [];
    for (let i = 0; i < ticks; i += 1) {
      snapshots.push(this.step());
    }
    return snapshots;
  }

  getSnapshot(): NetworkSnapshot {
    return this.aggregator.computeSnapshot({ network: this.network, timeStep: this.timeStep });
  }
}
