import { describe, expect, it, vi } from 'vitest';

import { fakeNetwork } from '../__tests__/fixtures';
import { FullyConnectedTopology } from '../strategies/FullyConnectedTopology';
import { IdGenerator } from '../utils/id';
import { Effector } from './Effector';

function recordingNetwork() {
  const calls: string[] = [];
  const setTopologyStrategy = vi.fn(() => {
    calls.push('topology');
  });
  const setNumMirrors = vi.fn(() => {
    calls.push('mirrors');
    return 0;
  });
  const setNumTargetedLinksPerMirror = vi.fn(() => {
    calls.push('links');
  });
  const network = fakeNetwork({ setTopologyStrategy, setNumMirrors, setNumTargetedLinksPerMirror });
  return { calls, network, setNumMirrors, setTopologyStrategy };
}

describe('Effector.timeStep', () => {
  it('applies topology, then mirrors, then links regardless of registration order', () => {
    const { calls, network } = recordingNetwork();
    const effector = new Effector(network);
    effector.setTargetLinksPerMirror(3, 4);
    effector.setMirrors(6, 4);
    effector.setStrategy(new FullyConnectedTopology(), 4);

    const applied = effector.timeStep(4);

    expect(calls).toEqual(['topology', 'mirrors', 'links']);
    expect(applied.map((action) => action.kind)).toEqual(['topology_change', 'mirror_change', 'target_link_change']);
  });

  it('passes the scheduled values and tick through', () => {
    const { network, setNumMirrors, setTopologyStrategy } = recordingNetwork();
    const effector = new Effector(network);
    const strategy = new FullyConnectedTopology();
    effector.setMirrors(6, 2);
    effector.setStrategy(strategy, 2);

    effector.timeStep(2);

    expect(setNumMirrors).toHaveBeenCalledWith(6, 2);
    expect(setTopologyStrategy).toHaveBeenCalledWith(strategy, 2);
  });

  it('does nothing on a tick without actions and applies each action once', () => {
    const { calls, network } = recordingNetwork();
    const effector = new Effector(network);
    effector.setMirrors(6, 5);

    expect(effector.timeStep(4)).toEqual([]);
    expect(effector.timeStep(5)).toHaveLength(1);
    expect(effector.timeStep(5)).toEqual([]);
    expect(calls).toEqual(['mirrors']);
    expect(effector.getPendingActions()).toEqual([]);
  });
});

describe('Effector scheduling', () => {
  it('keeps only the last action of a kind per tick', () => {
    const { network, setNumMirrors } = recordingNetwork();
    const effector = new Effector(network);
    const first = effector.setMirrors(5, 3);
    const second = effector.setMirrors(7, 3);

    expect(effector.removeAction(first)).toBe(false);
    expect(effector.getPendingActions()).toEqual([second]);

    effector.timeStep(3);
    expect(setNumMirrors).toHaveBeenCalledTimes(1);
    expect(setNumMirrors).toHaveBeenCalledWith(7, 3);
  });

  it('withdraws a queued action', () => {
    const { network, setNumMirrors } = recordingNetwork();
    const effector = new Effector(network);
    const action = effector.setMirrors(5, 3);

    expect(effector.removeAction(action)).toBe(true);
    expect(effector.removeAction(action)).toBe(false);
    effector.timeStep(3);
    expect(setNumMirrors).not.toHaveBeenCalled();
  });

  it('hands out fresh ids and lists pending actions by time', () => {
    const effector = new Effector(fakeNetwork(), new IdGenerator(10));
    const links = effector.setTargetLinksPerMirror(3, 5);
    const mirrors = effector.setMirrors(4, 2);
    const topology = effector.setStrategy(new FullyConnectedTopology(), 5);

    expect([links.id, mirrors.id, topology.id]).toEqual([10, 11, 12]);
    expect(effector.getPendingActions()).toEqual([mirrors, links, topology]);
  });
});
