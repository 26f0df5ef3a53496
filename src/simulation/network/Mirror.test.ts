import { describe, expect, it } from 'vitest';

import { Link } from './Link';
import { Mirror } from './Mirror';

function readyMirror(id: number): Mirror {
  const mirror = new Mirror({ id, creationTime: 0, startupTime: 0, readyTime: 0 });
  mirror.timeStep(0);
  return mirror;
}

function linkBetween(source: Mirror, target: Mirror, activationTime = 2): Link {
  const link = new Link({ id: 100, source, target, creationTime: 0, activationTime, bandwidth: 7 });
  source.addLink(link);
  target.addLink(link);
  return link;
}

describe('Mirror', () => {
  it('walks from starting to up to ready', () => {
    const mirror = new Mirror({ id: 1, creationTime: 0, startupTime: 2, readyTime: 1 });

    expect(mirror.timeStep(1)).toBe(false);
    expect(mirror.state).toBe('starting');
    expect(mirror.timeStep(2)).toBe(true);
    expect(mirror.state).toBe('up');
    expect(mirror.timeStep(3)).toBe(true);
    expect(mirror.isReady()).toBe(true);
    expect(mirror.timeStep(4)).toBe(false);
  });

  it('closes its links on shutdown and stays stopped', () => {
    const a = readyMirror(1);
    const b = readyMirror(2);
    const link = linkBetween(a, b);

    expect(a.shutdown(5)).toEqual([link]);
    expect(a.stoppedAt).toBe(5);
    expect(b.links.size).toBe(0);
    expect(link.state).toBe('closed');
    expect(a.timeStep(6)).toBe(false);
    expect(a.shutdown(7)).toEqual([]);
  });

  it('ignores links that do not touch it', () => {
    const a = readyMirror(1);
    const link = linkBetween(readyMirror(2), readyMirror(3));

    a.addLink(link);

    expect(a.getLinks()).toEqual([]);
  });

  it('finds links to a neighbour in either direction', () => {
    const a = readyMirror(1);
    const b = readyMirror(2);
    const link = linkBetween(b, a);

    expect(a.getLinksTo(b)).toEqual([link]);
    expect(a.isLinkedWith(b)).toBe(true);
    expect(a.isLinkedWith(readyMirror(3))).toBe(false);
  });
});

describe('Link', () => {
  it('activates once both ends are ready and the activation time has passed', () => {
    const a = readyMirror(1);
    const b = new Mirror({ id: 2, creationTime: 0, startupTime: 3, readyTime: 0 });
    const link = linkBetween(a, b);

    expect(link.timeStep(2)).toBe(false);
    expect(link.bandwidthUsed).toBe(0);

    b.timeStep(3);
    expect(link.timeStep(3)).toBe(true);
    expect(link.bandwidthUsed).toBe(7);
    expect(link.timeStep(4)).toBe(false);
  });

  it('knows its endpoints', () => {
    const a = readyMirror(1);
    const b = readyMirror(2);
    const c = readyMirror(3);
    const link = linkBetween(a, b);

    expect(link.connects(b, a)).toBe(true);
    expect(link.other(a)).toBe(b);
    expect(link.other(c)).toBeUndefined();
  });

  it('shuts down once', () => {
    const link = linkBetween(readyMirror(1), readyMirror(2));

    expect(link.shutdown()).toBe(true);
    expect(link.shutdown()).toBe(false);
    expect(link.isActive()).toBe(false);
  });
});
