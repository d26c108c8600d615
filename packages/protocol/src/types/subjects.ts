// Subject types - the users and groups that permissions are mapped to

/**
 * The two kinds of node in the membership graph
 */
export type SubjectKind = 'user' | 'group';

/**
 * A user or a group.
 *
 * User and group keys may share a type (both plain strings, say), so a
 * subject always says which of the two it is.
 */
export type Subject<TUser, TGroup> =
  | { kind: 'user'; id: TUser }
  | { kind: 'group'; id: TGroup };

/**
 * Wrap a user key as a subject
 */
export function asUser<TUser>(id: TUser): { kind: 'user'; id: TUser } {
  return { kind: 'user', id };
}

/**
 * Wrap a group key as a subject
 */
export function asGroup<TGroup>(id: TGroup): { kind: 'group'; id: TGroup } {
  return { kind: 'group', id };
}

export function isUserSubject<TUser, TGroup>(
  subject: Subject<TUser, TGroup>
): subject is { kind: 'user'; id: TUser } {
  return subject.kind === 'user';
}

export function isGroupSubject<TUser, TGroup>(
  subject: Subject<TUser, TGroup>
): subject is { kind: 'group'; id: TGroup } {
  return subject.kind === 'group';
}
