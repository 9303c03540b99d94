import { describe, it, expect } from 'vitest';
import { assembleIdentity } from './identity.js';

describe('assembleIdentity', () => {
  it('should carry username and groups over', () => {
    const identity = assembleIdentity({ username: 'alice', groups: new Set(['g1', 'g2']) });

    expect(identity.username).toBe('alice');
    expect([...identity.groups]).toEqual(['g1', 'g2']);
  });

  it('should accept an empty group set', () => {
    expect(assembleIdentity({ username: 'bob', groups: new Set() }).groups.size).toBe(0);
  });

  it('should not share the group set with the input', () => {
    const groups = new Set(['g1']);
    const identity = assembleIdentity({ username: 'alice', groups });
    groups.add('g2');

    expect(identity.groups.has('g2')).toBe(false);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(assembleIdentity({ username: 'alice', groups: new Set() }))).toBe(true);
  });
});
