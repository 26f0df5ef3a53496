import type { SimProps } from '../types/simulation';
import type { TopologyStrategy } from '../strategies/TopologyStrategy';
import { readIntProp, readOptionalIntProp } from '../config/props';
import { EventCollector } from '../engine/EventCollector';
import { IdGenerator } from '../utils/id';
import { createLogger } from '../utils/logger';
import { SeededRandom } from '../utils/random';
import type { ManagedNetwork, TopologyHost } from './contracts';
import { Link } from './Link';
import { Mirror } from './Mirror';

const logger = createLogger('network');

export interface NetworkOptions {
  strategy: TopologyStrategy;
  numMirrors: number;
  linksPerMirror: number;
  props: SimProps;
  ids?: IdGenerator;
  collector?: EventCollector;
}

interface Range {
  min: number;
  max: number;
}

function readRange(props: SimProps, prefix: string): Range {
  return { min: readIntProp(props, `${prefix}_min`), max: readIntProp(props, `${prefix}_max`) };
}

// In-process mirror network. Owns the mirrors and links, hands structural
// work to the active topology strategy and keeps per-tick quality histories.
export class Network implements ManagedNetwork, TopologyHost {
  private readonly props: SimProps;

  private readonly ids: IdGenerator;

  private readonly collector: EventCollector;

  private readonly rng: SeededRandom;

  private readonly maxBandwidth: number;

  private readonly startupTime: Range;

  private readonly readyTime: Range;

  private readonly activationTime: Range;

  private readonly mirrors = new Map<number, Mirror>();

  private readonly links = new Set<Link>();

  private readonly bandwidthHistory = new Map<number, number>();

  private readonly absoluteBandwidthHistory = new Map<number, number>();

  private readonly ttwHistory = new Map<number, number>();

  private readonly activeLinksHistory = new Map<number, number>();

  private strategy: TopologyStrategy;

  private numTargetMirrors: number;

  private numTargetLinksPerMirror: number;

  private currentTimeStep = 0;

  constructor(options: NetworkOptions) {
    this.props = options.props;
    this.ids = options.ids ?? new IdGenerator();
    this.collector = options.collector ?? new EventCollector();
    this.maxBandwidth = readIntProp(this.props, 'max_bandwidth');
    this.startupTime = readRange(this.props, 'startup_time');
    this.readyTime = readRange(this.props, 'ready_time');
    this.activationTime = readRange(this.props, 'link_activation_time');
    this.rng = new SeededRandom(readOptionalIntProp(this.props, 'seed') ?? 1);
    this.strategy = options.strategy;
    this.numTargetMirrors = Math.max(0, options.numMirrors);
    this.numTargetLinksPerMirror = options.linksPerMirror;

    for (let i = 0; i < this.numTargetMirrors; i += 1) {
      this.createMirror(0);
    }
    this.strategy.initNetwork(this, 0);
    logger.info(`initialized ${this.strategy.kind} with ${this.mirrors.size} mirrors and ${this.links.size} links`);
  }

  getTopologyStrategy(): TopologyStrategy {
    return this.strategy;
  }

  getProps(): SimProps {
    return this.props;
  }

  getCurrentTimeStep(): number {
    return this.currentTimeStep;
  }

  getEventCollector(): EventCollector {
    return this.collector;
  }

  getIdGenerator(): IdGenerator {
    return this.ids;
  }

  getMirrors(): Mirror[] {
    return [...this.mirrors.values()];
  }

  getMirror(id: number): Mirror | undefined {
    return this.mirrors.get(id);
  }

  getLinks(): Link[] {
    return [...this.links];
  }

  getNumMirrors(): number {
    return this.mirrors.size;
  }

  getNumReadyMirrors(): number {
    return this.getMirrors().filter((mirror) => mirror.isReady()).length;
  }

  getNumTargetMirrors(): number {
    return this.numTargetMirrors;
  }

  getNumTargetLinksPerMirror(): number {
    return this.numTargetLinksPerMirror;
  }

  getNumLinks(): number {
    return this.links.size;
  }

  getNumActiveLinks(): number {
    return this.getLinks().filter((link) => link.isActive()).length;
  }

  getNumTargetLinks(): number {
    return this.strategy.getNumTargetLinks(this);
  }

  getBandwidthUsed(): number {
    return this.getLinks().reduce((sum, link) => sum + link.bandwidthUsed, 0);
  }

  getBandwidthHistory(): ReadonlyMap<number, number> {
    return this.bandwidthHistory;
  }

  getTtwHistory(): ReadonlyMap<number, number> {
    return this.ttwHistory;
  }

  getActiveLinksHistory(): ReadonlyMap<number, number> {
    return this.activeLinksHistory;
  }

  // Returns how many mirrors were actually added or removed.
  setNumMirrors(numMirrors: number, simTime: number): number {
    const target = Math.max(0, numMirrors);
    const current = this.mirrors.size;
    logger.info(`setNumMirrors(${target}, ${simTime})`);
    let applied = 0;
    if (target > current) {
      applied = this.strategy.handleAddNewMirrors(this, target - current, simTime);
    } else if (target < current) {
      applied = this.strategy.handleRemoveMirrors(this, current - target, simTime);
    }
    this.numTargetMirrors = target;
    return applied;
  }

  setTopologyStrategy(strategy: TopologyStrategy, simTime: number): void {
    logger.info(`setTopologyStrategy(${strategy.kind}, ${simTime})`);
    this.strategy = strategy;
    if (simTime > 0) {
      strategy.restartNetwork(this, simTime);
    }
    this.collector.recordEvent({ type: 'topology_changed', detail: strategy.kind });
  }

  setNumTargetedLinksPerMirror(linksPerMirror: number, simTime: number): void {
    logger.info(`setNumTargetedLinksPerMirror(${linksPerMirror}, ${simTime})`);
    this.numTargetLinksPerMirror = linksPerMirror;
    if (simTime > 0) {
      this.strategy.restartNetwork(this, simTime);
    }
  }

  createMirror(simTime: number): Mirror {
    const mirror = new Mirror({
      id: this.ids.nextId(),
      creationTime: simTime,
      startupTime: this.rng.nextInt(this.startupTime.min, this.startupTime.max),
      readyTime: this.rng.nextInt(this.readyTime.min, this.readyTime.max),
    });
    this.mirrors.set(mirror.id, mirror);
    this.collector.recordEvent({ type: 'mirror_added', mirrorId: mirror.id });
    return mirror;
  }

  // Stops the mirror at once; its links close with it.
  shutdownMirror(id: number, simTime: number): boolean {
    const mirror = this.mirrors.get(id);
    if (!mirror) {
      return false;
    }
    for (const link of mirror.shutdown(simTime)) {
      this.forgetLink(link);
    }
    this.mirrors.delete(id);
    this.collector.recordEvent({ type: 'mirror_stopped', mirrorId: id });
    return true;
  }

  connect(sourceId: number, targetId: number, simTime: number): Link | undefined {
    const source = this.mirrors.get(sourceId);
    const target = this.mirrors.get(targetId);
    if (!source || !target || source === target || source.isStopped() || target.isStopped()) {
      return undefined;
    }
    const link = new Link({
      id: this.ids.nextId(),
      source,
      target,
      creationTime: simTime,
      activationTime: this.rng.nextInt(this.activationTime.min, this.activationTime.max),
      bandwidth: this.rng.nextInt(0, this.maxBandwidth),
    });
    source.addLink(link);
    target.addLink(link);
    this.links.add(link);
    this.collector.recordEvent({ type: 'link_created', linkId: link.id, mirrorId: sourceId });
    return link;
  }

  disconnect(sourceId: number, targetId: number): number {
    const source = this.mirrors.get(sourceId);
    const target = this.mirrors.get(targetId);
    if (!source || !target) {
      return 0;
    }
    let closed = 0;
    for (const link of source.getLinksTo(target)) {
      if (link.shutdown()) closed += 1;
      this.forgetLink(link);
    }
    return closed;
  }

  closeAllLinks(): number {
    let closed = 0;
    for (const link of this.getLinks()) {
      if (link.shutdown()) closed += 1;
      this.forgetLink(link);
    }
    return closed;
  }

  // Advances mirror and link lifecycles to `simTime`.
  timeStep(simTime: number): void {
    this.currentTimeStep = simTime;
    this.collector.setCurrentSimTime(simTime);
    for (const mirror of this.mirrors.values()) {
      mirror.timeStep(simTime);
    }
    for (const link of this.getLinks()) {
      if (link.timeStep(simTime)) {
        this.collector.recordEvent({ type: 'link_activated', linkId: link.id });
      }
    }
  }

  recordQuality(simTime: number): void {
    const used = this.getBandwidthUsed();
    const targetLinks = this.getNumTargetLinks();
    const maxTotal = targetLinks * this.maxBandwidth;
    this.absoluteBandwidthHistory.set(simTime, used);
    this.bandwidthHistory.set(simTime, maxTotal > 0 ? Math.trunc((100 * used) / maxTotal) : 0);
    this.ttwHistory.set(simTime, this.computeRelativeTtw());
    this.activeLinksHistory.set(
      simTime,
      targetLinks > 0 ? Math.min(100, Math.trunc((100 * this.getNumActiveLinks()) / targetLinks)) : 0,
    );
  }

  // Linear extrapolation from the last two recorded bandwidth samples.
  getPredictedBandwidth(simTime: number): number {
    const samples = [...this.absoluteBandwidthHistory.entries()].sort(([a], [b]) => a - b);
    const last = samples.at(-1);
    const previous = samples.at(-2);
    if (!last) {
      return 0;
    }
    if (!previous) {
      return last[1];
    }
    const slope = (last[1] - previous[1]) / (last[0] - previous[0]);
    return Math.max(0, Math.round(last[1] + slope * (simTime - last[0])));
  }

  // 100 when a write reaches every mirror in one hop, falling towards 0 as the
  // eccentricity of the first mirror approaches round(m / 2) hops.
  private computeRelativeTtw(): number {
    const mirrors = this.getMirrors();
    const [first] = mirrors;
    if (!first) {
      return 0;
    }
    const distance = new Map<Mirror, number>([[first, 0]]);
    const queue = [first];
    for (let i = 0; i < queue.length; i += 1) {
      const current = queue[i];
      if (!current) continue;
      const hops = distance.get(current) ?? 0;
      for (const link of current.links) {
        const next = link.isActive() ? link.other(current) : undefined;
        if (next && !distance.has(next)) {
          distance.set(next, hops + 1);
          queue.push(next);
        }
      }
    }
    if (distance.size < mirrors.length) {
      return 0;
    }
    const eccentricity = Math.max(...distance.values());
    const maxTtw = Math.round(mirrors.length / 2);
    if (maxTtw <= 1) {
      return 100;
    }
    return Math.min(100, Math.max(0, Math.round(100 - (100 * (eccentricity - 1)) / (maxTtw - 1))));
  }

  private forgetLink(link: Link): void {
    if (this.links.delete(link)) {
      this.collector.recordEvent({ type: 'link_closed', linkId: link.id });
    }
  }
}
