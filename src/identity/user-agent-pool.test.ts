import { describe, it, expect } from 'vitest';
import { FixedIdentity, UserAgentPool } from './user-agent-pool.js';

describe('UserAgentPool', () => {
  const agents = ['agent-a', 'agent-b', 'agent-c'];

  it('picks by the injected random source', () => {
    expect(new UserAgentPool(agents, () => 0).sample()).toBe('agent-a');
    expect(new UserAgentPool(agents, () => 0.5).sample()).toBe('agent-b');
    expect(new UserAgentPool(agents, () => 0.999).sample()).toBe('agent-c');
  });

  it('samples independently on every call', () => {
    const draws = [0.1, 0.9, 0.4];
    const pool = new UserAgentPool(agents, () => draws.shift() ?? 0);

    expect([pool.sample(), pool.sample(), pool.sample()]).toEqual(['agent-a', 'agent-c', 'agent-b']);
  });

  it('refuses an empty pool', () => {
    expect(() => new UserAgentPool([])).toThrow('UserAgentPool requires at least one user agent');
  });

  it('loads the bundled browser identities', () => {
    const pool = UserAgentPool.fromFile();

    expect(pool.size).toBe(12);
    expect(pool.sample()).toMatch(/^Mozilla\/5\.0 \(/);
  });
});

describe('FixedIdentity', () => {
  it('always returns the same agent', () => {
    const identity = new FixedIdentity('test-agent/1.0');
    expect([identity.sample(), identity.sample()]).toEqual(['test-agent/1.0', 'test-agent/1.0']);
  });
});
