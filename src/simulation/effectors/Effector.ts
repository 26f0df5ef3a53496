import type { ManagedNetwork } from '../network/contracts';
import type { TopologyStrategy } from '../strategies/TopologyStrategy';
import { IdGenerator } from '../utils/id';
import { createLogger } from '../utils/logger';
import { MirrorChange, TargetLinkChange, TopologyChange, type ReconfigurationAction } from './Action';

const logger = createLogger('effector');

// Per-tick queues of pending reconfigurations, one slot per action kind.
// Scheduling into an occupied slot replaces the queued action.
export class Effector {
  private readonly mirrorChanges = new Map<number, MirrorChange>();

  private readonly topologyChanges = new Map<number, TopologyChange>();

  private readonly linkChanges = new Map<number, TargetLinkChange>();

  constructor(
    private readonly network: ManagedNetwork,
    private readonly ids: IdGenerator = new IdGenerator(),
  ) {}

  setMirrors(newMirrors: number, time: number): MirrorChange {
    const action = new MirrorChange(this.ids.nextId(), this.network, time, newMirrors);
    this.mirrorChanges.set(time, action);
    return action;
  }

  setStrategy(strategy: TopologyStrategy, time: number): TopologyChange {
    const action = new TopologyChange(this.ids.nextId(), this.network, time, strategy);
    this.topologyChanges.set(time, action);
    return action;
  }

  setTargetLinksPerMirror(newLinksPerMirror: number, time: number): TargetLinkChange {
    const action = new TargetLinkChange(this.ids.nextId(), this.network, time, newLinksPerMirror);
    this.linkChanges.set(time, action);
    return action;
  }

  // Only removes the exact instance still queued at its own tick.
  removeAction(action: ReconfigurationAction): boolean {
    switch (action.kind) {
      case 'mirror_change':
        return removeIfQueued(this.mirrorChanges, action);
      case 'topology_change':
        return removeIfQueued(this.topologyChanges, action);
      case 'target_link_change':
        return removeIfQueued(this.linkChanges, action);
    }
  }

  getPendingActions(): ReconfigurationAction[] {
    const pending: ReconfigurationAction[] = [
      ...this.topologyChanges.values(),
      ...this.mirrorChanges.values(),
      ...this.linkChanges.values(),
    ];
    return pending.sort((a, b) => a.time - b.time || a.id - b.id);
  }

  // Applies whatever is due at `time`: topology first, then mirror count,
  // then links per mirror. Returns the applied actions in that order.
  timeStep(time: number): ReconfigurationAction[] {
    const applied: ReconfigurationAction[] = [];

    const topologyChange = this.topologyChanges.get(time);
    if (topologyChange) {
      this.topologyChanges.delete(time);
      logger.info(`t=${time} topology -> ${topologyChange.newTopology.kind}`);
      this.network.setTopologyStrategy(topologyChange.newTopology, time);
      applied.push(topologyChange);
    }

    const mirrorChange = this.mirrorChanges.get(time);
    if (mirrorChange) {
      this.mirrorChanges.delete(time);
      logger.info(`t=${time} mirrors -> ${mirrorChange.newMirrors}`);
      this.network.setNumMirrors(mirrorChange.newMirrors, time);
      applied.push(mirrorChange);
    }

    const linkChange = this.linkChanges.get(time);
    if (linkChange) {
      this.linkChanges.delete(time);
      logger.info(`t=${time} links per mirror -> ${linkChange.newLinksPerMirror}`);
      this.network.setNumTargetedLinksPerMirror(linkChange.newLinksPerMirror, time);
      applied.push(linkChange);
    }

    return applied;
  }
}

function removeIfQueued<T extends ReconfigurationAction>(queue: Map<number, T>, action: T): boolean {
  if (queue.get(action.time) !== action) {
    return false;
  }
  queue.delete(action.time);
  return true;
}
