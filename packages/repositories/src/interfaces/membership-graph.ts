import type { Subject } from '@grantgraph/protocol';

/**
 * Answers whether a subject exists. The mapping store validates subjects
 * through this, without owning them.
 */
export interface SubjectLookup<TUser, TGroup> {
  hasUser(user: TUser): boolean;
  hasGroup(group: TGroup): boolean;
}

/**
 * Repository interface for the membership graph.
 *
 * Nodes are users (leaves) and groups. A directed edge means "source is a
 * member of target": user → group or group → group. The graph owns its
 * nodes and edges; nothing else holds references to them.
 */
export interface MembershipGraph<TUser, TGroup> extends SubjectLookup<TUser, TGroup> {
  /**
   * Add a user
   * @throws DuplicateElementError if the user exists
   */
  addUser(user: TUser): void;

  /**
   * Remove a user and every edge leaving it
   * @throws NotFoundError if the user does not exist
   */
  removeUser(user: TUser): void;

  /**
   * Add a group
   * @throws DuplicateElementError if the group exists
   */
  addGroup(group: TGroup): void;

  /**
   * Remove a group and every edge entering or leaving it
   * @throws NotFoundError if the group does not exist
   */
  removeGroup(group: TGroup): void;

  /** All users, in insertion order */
  users(): TUser[];

  /** All groups, in insertion order */
  groups(): TGroup[];

  /**
   * Make a user a member of a group
   * @throws NotFoundError naming the missing endpoint
   * @throws DuplicateElementError if the edge exists
   */
  addUserToGroupEdge(user: TUser, group: TGroup): void;

  /**
   * @throws NotFoundError if either endpoint or the edge does not exist
   */
  removeUserToGroupEdge(user: TUser, group: TGroup): void;

  /**
   * Make `fromGroup` a member of `toGroup`. No cycle detection happens here.
   * @throws NotFoundError naming the missing endpoint
   * @throws InvalidReferenceError if both groups are the same
   * @throws DuplicateElementError if the edge exists
   */
  addGroupToGroupEdge(fromGroup: TGroup, toGroup: TGroup): void;

  /**
   * @throws NotFoundError if either endpoint or the edge does not exist
   */
  removeGroupToGroupEdge(fromGroup: TGroup, toGroup: TGroup): void;

  /**
   * Groups the user is directly a member of
   * @throws NotFoundError if the user does not exist
   */
  groupsOfUser(user: TUser): TGroup[];

  /**
   * Groups the group is directly a member of
   * @throws NotFoundError if the group does not exist
   */
  groupsOfGroup(group: TGroup): TGroup[];

  /**
   * Groups a user or group is directly a member of
   * @throws NotFoundError if the subject does not exist
   */
  outgoingGroupsOf(subject: Subject<TUser, TGroup>): TGroup[];

  /** Whether the subject exists */
  hasSubject(subject: Subject<TUser, TGroup>): boolean;

  /** Remove every node and edge */
  clear(): void;
}
