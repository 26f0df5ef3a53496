import type { ManagedNetwork } from '../network/contracts';
import type { TopologyStrategy } from '../strategies/TopologyStrategy';
import { Effect } from './Effect';

export type ActionKind = 'mirror_change' | 'target_link_change' | 'topology_change';

// An immutable reconfiguration request scheduled for one tick. Its predicted
// impact is computed lazily from the live network through `effect`.
export abstract class Action {
  abstract readonly kind: ActionKind;

  readonly id: number;

  readonly time: number;

  readonly network: ManagedNetwork;

  private cachedEffect: Effect | undefined;

  constructor(id: number, network: ManagedNetwork, time: number) {
    if (!Number.isInteger(time) || time < 0) {
      throw new RangeError(`Action time must be a non-negative integer, got ${time}`);
    }
    this.id = id;
    this.network = network;
    this.time = time;
  }

  abstract readonly effect: Effect;

  protected memoizeEffect(create: () => Effect): Effect {
    this.cachedEffect ??= create();
    return this.cachedEffect;
  }
}

export class MirrorChange extends Action {
  readonly kind = 'mirror_change';

  constructor(
    id: number,
    network: ManagedNetwork,
    time: number,
    readonly newMirrors: number,
  ) {
    super(id, network, time);
  }

  get effect(): Effect {
    return this.memoizeEffect(() => new Effect(this));
  }
}

export class TargetLinkChange extends Action {
  readonly kind = 'target_link_change';

  constructor(
    id: number,
    network: ManagedNetwork,
    time: number,
    readonly newLinksPerMirror: number,
  ) {
    super(id, network, time);
  }

  get effect(): Effect {
    return this.memoizeEffect(() => new Effect(this));
  }
}

export class TopologyChange extends Action {
  readonly kind = 'topology_change';

  constructor(
    id: number,
    network: ManagedNetwork,
    time: number,
    readonly newTopology: TopologyStrategy,
  ) {
    super(id, network, time);
  }

  get effect(): Effect {
    return this.memoizeEffect(() => new Effect(this));
  }
}

export type ReconfigurationAction = MirrorChange | TargetLinkChange | TopologyChange;
