import { describe, expect, it } from 'vitest';

import { makeNetwork, ringGraph } from '../__tests__/fixtures';
import { FullyConnectedTopology } from '../strategies/FullyConnectedTopology';
import { RingTopologyStrategy } from '../strategies/RingTopologyStrategy';
import { SnowflakeTopologyStrategy } from '../strategies/SnowflakeTopologyStrategy';
import { MirrorStructure } from './MirrorStructure';

describe('MirrorStructure on a built ring', () => {
  it('sees every planned link realized', () => {
    const strategy = new RingTopologyStrategy();
    const network = makeNetwork(strategy, 4);
    const structure = strategy.getMirrorStructure(network);

    expect(structure.getNumPlannedLinks(0)).toBe(2);
    expect(structure.getNumImplementedLinks(0)).toBe(2);
    expect(structure.getNumPendingLinks(0)).toBe(0);
    expect(structure.isLinkedWith(0, 1)).toBe(true);
    expect(structure.isValidStructure('ring', 0)).toBe(true);
    expect(structure.getLinksOfStructure('ring', 0).size).toBe(4);
    expect(structure.getEdgeLinks('ring', 0).size).toBe(0);
  });

  it('tells a planned edge from an implemented one', () => {
    const strategy = new RingTopologyStrategy();
    const network = makeNetwork(strategy, 4);
    const structure = strategy.getMirrorStructure(network);

    expect(structure.isLinkedWith(0, 2)).toBe(false);

    network.disconnect(0, 1);

    expect(structure.hasStructuralEdge(0, 1)).toBe(true);
    expect(structure.isLinkedWith(0, 1)).toBe(false);
    expect(structure.getNumPendingLinks(0)).toBe(1);
    expect(structure.isValidStructure('ring', 0)).toBe(false);
  });
});

describe('MirrorStructure on a snowflake', () => {
  it('plans links under each node kind only', () => {
    const strategy = new SnowflakeTopologyStrategy();
    const network = makeNetwork(strategy, 9);
    const structure = strategy.getMirrorStructure(network);

    expect(structure.getNumPlannedLinks(0)).toBe(2);
    expect(structure.getNumImplementedLinks(0)).toBe(4);
    expect(structure.getNumPendingLinks(0)).toBe(0);
    expect(structure.getNumPlannedLinks(3)).toBe(1);
    expect(structure.isValidStructure('star', 1)).toBe(true);
    expect(structure.getEdgeLinks('star', 1).size).toBe(2);
  });
});

describe('MirrorStructure link classification', () => {
  // Mirrors 0..4 fully meshed; the structure only claims a ring over 0, 1, 2.
  function ringOverMesh(): MirrorStructure {
    const network = makeNetwork(new FullyConnectedTopology(), 5);
    return new MirrorStructure(ringGraph(3), (id) => network.getMirror(id));
  }

  it('splits links into internal and edge links', () => {
    const structure = ringOverMesh();

    expect(structure.getMirrorsOfStructure('ring', 0).map((mirror) => mirror.id)).toEqual([0, 1, 2]);
    expect(structure.getLinksOfStructure('ring', 0).size).toBe(3);
    expect(structure.getEdgeLinks('ring', 0).size).toBe(6);
  });

  it('counts implemented links leaving the substructure', () => {
    expect(ringOverMesh().countEdgeLinks(0, new Set([0, 1, 2]))).toBe(2);
  });

  it('needs both layers for isLinkedWith', () => {
    const structure = ringOverMesh();

    expect(structure.isLinkedWith(0, 2)).toBe(true);
    expect(structure.isLinkedWith(0, 3)).toBe(false);
  });

  it('has no mirror for unknown nodes', () => {
    expect(ringOverMesh().getMirror(3)).toBeUndefined();
  });
});
