// Membership traversal
//
// Depth-first walk from a subject along "member of" edges. The subject is
// visited first, then every ancestor group exactly once: a per-walk visited
// set, keyed by codec key, stops diamonds from being counted twice and
// cycles from looping.

import { isGroupSubject, type Subject } from '@grantgraph/protocol';
import type { StoreContext } from '@grantgraph/repositories';

/**
 * Called for each visited node. Return true to stop the walk.
 */
export type MembershipVisitor<TUser, TGroup> = (node: Subject<TUser, TGroup>) => boolean;

/**
 * Walk the subject and its ancestor groups.
 *
 * @returns true if the visitor stopped the walk, false if every reachable
 *   node was visited
 * @throws NotFoundError if the subject does not exist
 */
export function walkMemberships<TUser, TGroup, TComponent, TAccess>(
  stores: StoreContext<TUser, TGroup, TComponent, TAccess>,
  subject: Subject<TUser, TGroup>,
  visit: MembershipVisitor<TUser, TGroup>
): boolean {
  const { graph, codecs } = stores;
  // Throws for an unknown subject before anything is visited
  const direct = graph.outgoingGroupsOf(subject);

  const visited = new Set<string>();
  if (isGroupSubject(subject)) {
    visited.add(codecs.group.toKey(subject.id));
  }
  if (visit(subject)) {
    return true;
  }

  // Reversed so groups come off the stack in adjacency order
  const stack: TGroup[] = [...direct].reverse();
  while (stack.length > 0) {
    const group = stack.pop();
    if (group === undefined) break;
    const key = codecs.group.toKey(group);
    if (visited.has(key)) continue;
    visited.add(key);

    const node: Subject<TUser, TGroup> = { kind: 'group', id: group };
    if (visit(node)) {
      return true;
    }

    const parents = graph.groupsOfGroup(group);
    for (let i = parents.length - 1; i >= 0; i--) {
      if (!visited.has(codecs.group.toKey(parents[i]))) {
        stack.push(parents[i]);
      }
    }
  }

  return false;
}

/**
 * Whether any node reachable from the subject satisfies the predicate.
 * Stops at the first match.
 */
export function someMembership<TUser, TGroup, TComponent, TAccess>(
  stores: StoreContext<TUser, TGroup, TComponent, TAccess>,
  subject: Subject<TUser, TGroup>,
  predicate: (node: Subject<TUser, TGroup>) => boolean
): boolean {
  return walkMemberships(stores, subject, predicate);
}

/**
 * Visit every node reachable from the subject, each once.
 */
export function forEachMembership<TUser, TGroup, TComponent, TAccess>(
  stores: StoreContext<TUser, TGroup, TComponent, TAccess>,
  subject: Subject<TUser, TGroup>,
  visit: (node: Subject<TUser, TGroup>) => void
): void {
  walkMemberships(stores, subject, (node) => {
    visit(node);
    return false;
  });
}
