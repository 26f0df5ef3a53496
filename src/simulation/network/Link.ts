import type { LinkState } from '../types/simulation';
import type { Mirror } from './Mirror';

export interface LinkOptions {
  id: number;
  source: Mirror;
  target: Mirror;
  creationTime: number;
  activationTime: number;
  bandwidth: number;
}

// Connection between two mirrors. Compared by identity; two links between the
// same pair of mirrors are still distinct links.
export class Link {
  readonly id: number;

  readonly source: Mirror;

  readonly target: Mirror;

  readonly creationTime: number;

  readonly activationTime: number;

  readonly bandwidth: number;

  private currentState: LinkState = 'inactive';

  constructor(options: LinkOptions) {
    this.id = options.id;
    this.source = options.source;
    this.target = options.target;
    this.creationTime = options.creationTime;
    this.activationTime = Math.max(0, options.activationTime);
    this.bandwidth = Math.max(0, options.bandwidth);
  }

  get state(): LinkState {
    return this.currentState;
  }

  isActive(): boolean {
    return this.currentState === 'active';
  }

  // Bandwidth carried this tick; only active links carry any.
  get bandwidthUsed(): number {
    return this.isActive() ? this.bandwidth : 0;
  }

  connects(a: Mirror, b: Mirror): boolean {
    return (this.source === a && this.target === b) || (this.source === b && this.target === a);
  }

  other(mirror: Mirror): Mirror | undefined {
    if (mirror === this.source) return this.target;
    if (mirror === this.target) return this.source;
    return undefined;
  }

  // Returns true on the tick the link becomes active.
  timeStep(simTime: number): boolean {
    if (this.currentState !== 'inactive') {
      return false;
    }
    if (!this.source.isReady() || !this.target.isReady()) {
      return false;
    }
    if (simTime - this.creationTime < this.activationTime) {
      return false;
    }
    this.currentState = 'active';
    return true;
  }

  shutdown(): boolean {
    if (this.currentState === 'closed') {
      return false;
    }
    this.currentState = 'closed';
    this.source.removeLink(this);
    this.target.removeLink(this);
    return true;
  }
}
