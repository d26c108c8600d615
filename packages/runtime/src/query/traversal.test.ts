// Tests for membership traversal

import { describe, it, expect, vi } from 'vitest';
import { NotFoundError, asGroup, asUser, stringCodecs, type Subject } from '@grantgraph/protocol';
import { createInMemoryStoreContext } from '@grantgraph/repositories';
import { forEachMembership, someMembership, walkMemberships } from './traversal.js';

// --- Test Fixtures ---

/**
 * u → A, u → B, A → C, B → C: a diamond above one user.
 */
function createDiamond() {
  const stores = createInMemoryStoreContext(stringCodecs);
  stores.graph.addUser('u');
  for (const group of ['A', 'B', 'C']) {
    stores.graph.addGroup(group);
  }
  stores.graph.addUserToGroupEdge('u', 'A');
  stores.graph.addUserToGroupEdge('u', 'B');
  stores.graph.addGroupToGroupEdge('A', 'C');
  stores.graph.addGroupToGroupEdge('B', 'C');
  return stores;
}

function label(node: Subject<string, string>): string {
  return `${node.kind}:${node.id}`;
}

// --- Tests ---

describe('walkMemberships', () => {
  it('should visit the subject first, then each group once depth-first', () => {
    const stores = createDiamond();
    const visited: string[] = [];

    forEachMembership(stores, asUser('u'), (node) => visited.push(label(node)));

    expect(visited).toEqual(['user:u', 'group:A', 'group:C', 'group:B']);
  });

  it('should stop at the first node the visitor accepts', () => {
    const stores = createDiamond();
    const visited: string[] = [];

    const stopped = walkMemberships(stores, asUser('u'), (node) => {
      visited.push(label(node));
      return node.id === 'A';
    });

    expect(stopped).toBe(true);
    expect(visited).toEqual(['user:u', 'group:A']);
  });

  it('should terminate on a cycle', () => {
    const stores = createDiamond();
    stores.graph.addGroupToGroupEdge('C', 'A');
    const visited: string[] = [];

    forEachMembership(stores, asGroup('A'), (node) => visited.push(label(node)));

    expect(visited).toEqual(['group:A', 'group:C']);
  });

  it('should throw NotFoundError for an unknown subject before visiting', () => {
    const stores = createDiamond();
    const visit = vi.fn(() => false);

    expect(() => walkMemberships(stores, asUser('nobody'), visit)).toThrow(NotFoundError);
    expect(() => walkMemberships(stores, asGroup('u'), visit)).toThrow(
      "Group 'u' in argument 'group' does not exist."
    );
    expect(visit).not.toHaveBeenCalled();
  });
});

describe('someMembership', () => {
  it('should report whether any reachable node matches', () => {
    const stores = createDiamond();

    expect(someMembership(stores, asUser('u'), (node) => node.id === 'C')).toBe(true);
    expect(someMembership(stores, asGroup('C'), (node) => node.id === 'A')).toBe(false);
  });
});
