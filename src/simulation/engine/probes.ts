import type { NetworkSnapshot } from '../types/simulation';

export interface Probe {
  update(snapshot: NetworkSnapshot): void;
}

export interface MirrorSample {
  timeStep: number;
  numMirrors: number;
  numReadyMirrors: number;
  numTargetMirrors: number;
}

export interface LinkSample {
  timeStep: number;
  numLinks: number;
  numActiveLinks: number;
  numTargetLinks: number;
  relativeActiveLinks: number;
}

abstract class SeriesProbe<T> implements Probe {
  private readonly series: T[] = [];

  protected abstract sample(snapshot: NetworkSnapshot): T;

  update(snapshot: NetworkSnapshot): void {
    this.series.push(this.sample(snapshot));
  }

  getSeries(): readonly T[] {
    return this.series;
  }

  latest(): T | undefined {
    return this.series.at(-1);
  }
}

export class MirrorProbe extends SeriesProbe<MirrorSample> {
  protected sample(snapshot: NetworkSnapshot): MirrorSample {
    return {
      timeStep: snapshot.timeStep,
      numMirrors: snapshot.numMirrors,
      numReadyMirrors: snapshot.numReadyMirrors,
      numTargetMirrors: snapshot.numTargetMirrors,
    };
  }
}

export class LinkProbe extends SeriesProbe<LinkSample> {
  protected sample(snapshot: NetworkSnapshot): LinkSample {
    return {
      timeStep: snapshot.timeStep,
      numLinks: snapshot.numLinks,
      numActiveLinks: snapshot.numActiveLinks,
      numTargetLinks: snapshot.numTargetLinks,
      relativeActiveLinks: snapshot.relativeActiveLinks,
    };
  }
}
