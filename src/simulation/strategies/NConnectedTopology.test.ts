import { describe, expect, it } from 'vitest';

import { makeNetwork } from '../__tests__/fixtures';
import { NConnectedTopology, effectiveDegree } from './NConnectedTopology';

describe('effectiveDegree', () => {
  it('stays between two and m - 1', () => {
    expect(effectiveDegree(10, 1)).toBe(2);
    expect(effectiveDegree(3, 5)).toBe(2);
    expect(effectiveDegree(10, 4)).toBe(4);
    expect(effectiveDegree(1, 4)).toBe(0);
  });
});

describe('NConnectedTopology', () => {
  it('counts neighbour and diameter links', () => {
    const strategy = new NConnectedTopology();

    expect(strategy.computeTargetLinks(6, 3)).toBe(9);
    expect(strategy.computeTargetLinks(5, 3)).toBe(5);
    expect(strategy.computeTargetLinks(5, 4)).toBe(10);
    expect(strategy.computeTargetLinks(2, 2)).toBe(1);
    expect(strategy.computeTargetLinks(1, 2)).toBe(0);
  });

  it('lays out a circulant graph with diameters', () => {
    const strategy = new NConnectedTopology();
    const network = makeNetwork(strategy, 6, 3);
    const graph = strategy.getStructure();

    expect(network.getNumLinks()).toBe(9);
    expect(graph.getChildren(0, 'n_connected', 0)).toEqual([1, 3]);
    expect(strategy.validateStructure(graph)).toBe(true);
  });

  it('keeps the surviving links when it lays out again', () => {
    const strategy = new NConnectedTopology();
    const network = makeNetwork(strategy, 6, 3);

    // Mirrors 0..5 and links 6..14 used the first ids.
    expect(network.setNumMirrors(7, 1)).toBe(1);
    expect(strategy.getStructure().hasNode(15)).toBe(true);
    expect(network.getNumLinks()).toBe(7);
    expect(strategy.getMirrorStructure(network).isValidStructure('n_connected', 0)).toBe(true);
  });

  it('removes the highest ids', () => {
    const strategy = new NConnectedTopology();
    const network = makeNetwork(strategy, 6);

    expect(network.setNumMirrors(4, 1)).toBe(2);
    expect(strategy.getStructure().nodeIds()).toEqual([0, 1, 2, 3]);
    expect(network.getNumLinks()).toBe(4);
  });
});
