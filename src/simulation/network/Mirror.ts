import type { MirrorState } from '../types/simulation';
import type { Link } from './Link';

export interface MirrorOptions {
  id: number;
  creationTime: number;
  startupTime: number;
  readyTime: number;
}

// A replica endpoint. Walks starting → up → ready on its own clock once
// created; shutdown is immediate and closes every attached link.
export class Mirror {
  readonly id: number;

  readonly creationTime: number;

  readonly startupTime: number;

  readonly readyTime: number;

  stoppedAt: number | undefined;

  private currentState: MirrorState = 'starting';

  private readonly linkSet = new Set<Link>();

  constructor(options: MirrorOptions) {
    this.id = options.id;
    this.creationTime = options.creationTime;
    this.startupTime = Math.max(0, options.startupTime);
    this.readyTime = Math.max(0, options.readyTime);
  }

  get state(): MirrorState {
    return this.currentState;
  }

  get links(): ReadonlySet<Link> {
    return this.linkSet;
  }

  getLinks(): Link[] {
    return [...this.linkSet];
  }

  isReady(): boolean {
    return this.currentState === 'ready';
  }

  isStopped(): boolean {
    return this.currentState === 'stopped';
  }

  addLink(link: Link): void {
    if (link.source !== this && link.target !== this) {
      return;
    }
    this.linkSet.add(link);
  }

  removeLink(link: Link): boolean {
    return this.linkSet.delete(link);
  }

  getLinksTo(other: Mirror): Link[] {
    return this.getLinks().filter((link) => link.other(this) === other);
  }

  isLinkedWith(other: Mirror): boolean {
    return this.getLinksTo(other).length > 0;
  }

  // Returns true when the state changed this tick.
  timeStep(simTime: number): boolean {
    if (this.currentState === 'stopped') {
      return false;
    }
    const elapsed = simTime - this.creationTime;
    const previous = this.currentState;
    if (elapsed >= this.startupTime + this.readyTime) {
      this.currentState = 'ready';
    } else if (elapsed >= this.startupTime) {
      this.currentState = 'up';
    }
    return previous !== this.currentState;
  }

  // Closes and returns every link that was still attached.
  shutdown(simTime: number): Link[] {
    if (this.currentState === 'stopped') {
      return [];
    }
    this.currentState = 'stopped';
    const closed: Link[] = [];
    for (const link of this.getLinks()) {
      if (link.shutdown()) closed.push(link);
    }
    this.stoppedAt = simTime;
    return closed;
  }
}
