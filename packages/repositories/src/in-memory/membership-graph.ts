// In-memory membership graph
//
// Nodes live in two arenas keyed by codec key. Each node's outgoing edges
// are an adjacency map from target group key to the target group value, so
// traversal never has to decode a key.

import {
  DuplicateElementError,
  InvalidReferenceError,
  NotFoundError,
  isUserSubject,
  type KeyCodec,
  type Subject,
} from '@grantgraph/protocol';
import type { MembershipGraph } from '../interfaces/index.js';

/**
 * Underlying data of the in-memory graph (for debugging/testing)
 */
export type MembershipGraphData<TUser, TGroup> = {
  users: Map<string, TUser>;
  groups: Map<string, TGroup>;
  /** user key → (group key → group) */
  userToGroup: Map<string, Map<string, TGroup>>;
  /** group key → (group key → group) */
  groupToGroup: Map<string, Map<string, TGroup>>;
};

export interface InMemoryMembershipGraph<TUser, TGroup> extends MembershipGraph<TUser, TGroup> {
  /** Direct access to underlying data (for debugging/testing) */
  _data: MembershipGraphData<TUser, TGroup>;
  /** Capture the current state; the returned function puts it back */
  _checkpoint(): () => void;
}

/**
 * Create an in-memory membership graph.
 *
 * @example
 * ```typescript
 * const graph = createInMemoryMembershipGraph({ user: stringCodec, group: stringCodec });
 * graph.addUser('mae');
 * graph.addGroup('sales-managers');
 * graph.addUserToGroupEdge('mae', 'sales-managers');
 * graph.outgoingGroupsOf(asUser('mae')); // ['sales-managers']
 * ```
 */
export function createInMemoryMembershipGraph<TUser, TGroup>(codecs: {
  user: KeyCodec<TUser>;
  group: KeyCodec<TGroup>;
}): InMemoryMembershipGraph<TUser, TGroup> {
  const users = new Map<string, TUser>();
  const groups = new Map<string, TGroup>();
  const userToGroup = new Map<string, Map<string, TGroup>>();
  const groupToGroup = new Map<string, Map<string, TGroup>>();

  const requireUser = (user: TUser, argument: string): string => {
    const key = codecs.user.toKey(user);
    if (!users.has(key)) {
      throw new NotFoundError('user', key, { argument });
    }
    return key;
  };

  const requireGroup = (group: TGroup, argument: string): string => {
    const key = codecs.group.toKey(group);
    if (!groups.has(key)) {
      throw new NotFoundError('group', key, { argument });
    }
    return key;
  };

  const edgesOf = (
    adjacency: Map<string, Map<string, TGroup>>,
    key: string
  ): Map<string, TGroup> => {
    let edges = adjacency.get(key);
    if (!edges) {
      edges = new Map();
      adjacency.set(key, edges);
    }
    return edges;
  };

  const graph: InMemoryMembershipGraph<TUser, TGroup> = {
    addUser(user) {
      const key = codecs.user.toKey(user);
      if (users.has(key)) {
        throw new DuplicateElementError('user', key, `User '${key}' in argument 'user' already exists.`);
      }
      users.set(key, user);
    },

    removeUser(user) {
      const key = requireUser(user, 'user');
      userToGroup.delete(key);
      users.delete(key);
    },

    hasUser(user) {
      return users.has(codecs.user.toKey(user));
    },

    users() {
      return Array.from(users.values());
    },

    addGroup(group) {
      const key = codecs.group.toKey(group);
      if (groups.has(key)) {
        throw new DuplicateElementError('group', key, `Group '${key}' in argument 'group' already exists.`);
      }
      groups.set(key, group);
    },

    removeGroup(group) {
      const key = requireGroup(group, 'group');
      // Incoming edges are only reachable by scanning every adjacency map
      for (const edges of userToGroup.values()) {
        edges.delete(key);
      }
      for (const edges of groupToGroup.values()) {
        edges.delete(key);
      }
      groupToGroup.delete(key);
      groups.delete(key);
    },

    hasGroup(group) {
      return groups.has(codecs.group.toKey(group));
    },

    groups() {
      return Array.from(groups.values());
    },

    addUserToGroupEdge(user, group) {
      const userKey = requireUser(user, 'user');
      const groupKey = requireGroup(group, 'group');
      const edges = edgesOf(userToGroup, userKey);
      if (edges.has(groupKey)) {
        throw new DuplicateElementError(
          'userToGroupMapping',
          `${userKey}->${groupKey}`,
          `A mapping between user '${userKey}' and group '${groupKey}' already exists.`
        );
      }
      edges.set(groupKey, group);
    },

    removeUserToGroupEdge(user, group) {
      const userKey = requireUser(user, 'user');
      const groupKey = requireGroup(group, 'group');
      const edges = userToGroup.get(userKey);
      if (!edges || !edges.delete(groupKey)) {
        throw new NotFoundError('userToGroupMapping', `${userKey}->${groupKey}`, {
          message: `A mapping between user '${userKey}' and group '${groupKey}' does not exist.`,
        });
      }
    },

    addGroupToGroupEdge(fromGroup, toGroup) {
      const fromKey = requireGroup(fromGroup, 'fromGroup');
      const toKey = requireGroup(toGroup, 'toGroup');
      if (fromKey === toKey) {
        throw new InvalidReferenceError(
          fromKey,
          toKey,
          `Arguments 'fromGroup' and 'toGroup' cannot contain the same group ('${fromKey}').`
        );
      }
      const edges = edgesOf(groupToGroup, fromKey);
      if (edges.has(toKey)) {
        throw new DuplicateElementError(
          'groupToGroupMapping',
          `${fromKey}->${toKey}`,
          `A mapping between group '${fromKey}' and group '${toKey}' already exists.`
        );
      }
      edges.set(toKey, toGroup);
    },

    removeGroupToGroupEdge(fromGroup, toGroup) {
      const fromKey = requireGroup(fromGroup, 'fromGroup');
      const toKey = requireGroup(toGroup, 'toGroup');
      const edges = groupToGroup.get(fromKey);
      if (!edges || !edges.delete(toKey)) {
        throw new NotFoundError('groupToGroupMapping', `${fromKey}->${toKey}`, {
          message: `A mapping between group '${fromKey}' and group '${toKey}' does not exist.`,
        });
      }
    },

    groupsOfUser(user) {
      const key = requireUser(user, 'user');
      return Array.from(userToGroup.get(key)?.values() ?? []);
    },

    groupsOfGroup(group) {
      const key = requireGroup(group, 'group');
      return Array.from(groupToGroup.get(key)?.values() ?? []);
    },

    outgoingGroupsOf(subject: Subject<TUser, TGroup>) {
      return isUserSubject(subject)
        ? graph.groupsOfUser(subject.id)
        : graph.groupsOfGroup(subject.id);
    },

    hasSubject(subject: Subject<TUser, TGroup>) {
      return isUserSubject(subject) ? graph.hasUser(subject.id) : graph.hasGroup(subject.id);
    },

    clear() {
      users.clear();
      groups.clear();
      userToGroup.clear();
      groupToGroup.clear();
    },

    _data: { users, groups, userToGroup, groupToGroup },

    _checkpoint() {
      const savedUsers = new Map(users);
      const savedGroups = new Map(groups);
      const savedUserToGroup = copyAdjacency(userToGroup);
      const savedGroupToGroup = copyAdjacency(groupToGroup);

      return () => {
        refill(users, savedUsers);
        refill(groups, savedGroups);
        refill(userToGroup, savedUserToGroup);
        refill(groupToGroup, savedGroupToGroup);
      };
    },
  };

  return graph;
}

function copyAdjacency<T>(adjacency: Map<string, Map<string, T>>): Map<string, Map<string, T>> {
  const copy = new Map<string, Map<string, T>>();
  for (const [key, edges] of adjacency) {
    copy.set(key, new Map(edges));
  }
  return copy;
}

/**
 * Replace the contents of `target` with those of `source`, keeping the
 * `target` instance so references to it stay valid.
 */
export function refill<K, V>(target: Map<K, V>, source: Map<K, V>): void {
  target.clear();
  for (const [key, value] of source) {
    target.set(key, value);
  }
}
