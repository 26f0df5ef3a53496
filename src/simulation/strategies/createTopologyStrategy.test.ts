import { describe, expect, it } from 'vitest';

import { RingTopologyStrategy } from './RingTopologyStrategy';
import { SnowflakeTopologyStrategy } from './SnowflakeTopologyStrategy';
import { createTopologyStrategy, isTopologyKind } from './createTopologyStrategy';

describe('createTopologyStrategy', () => {
  it('resolves names case-insensitively', () => {
    const strategy = createTopologyStrategy(' Ring ');

    expect(strategy).toBeInstanceOf(RingTopologyStrategy);
    expect(strategy.toString()).toBe('ring');
  });

  it('passes options to the strategies that take them', () => {
    const strategy = createTopologyStrategy('snowflake', { ringSize: 4 });

    expect(strategy).toBeInstanceOf(SnowflakeTopologyStrategy);
    expect(strategy.computeTargetLinks(11, 2)).toBe(0);
    expect(strategy.computeTargetLinks(12, 2)).toBe(12);
  });

  it('builds every known topology', () => {
    for (const name of ['balanced_tree', 'depth_limited_tree', 'line', 'star', 'fully_connected', 'n_connected']) {
      expect(createTopologyStrategy(name).kind).toBe(name);
    }
  });

  it('rejects unknown names', () => {
    expect(() => createTopologyStrategy('mesh')).toThrow(/Unknown topology "mesh"/);
    expect(isTopologyKind('star')).toBe(true);
    expect(isTopologyKind('hub')).toBe(false);
  });
});
