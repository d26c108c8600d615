// Snapshot document - the persistence boundary
//
// A snapshot is the whole state of an access manager with every
// caller-typed value replaced by its codec key. Storing and loading it is
// up to the caller.

export const SNAPSHOT_VERSION = 1;

export type AccessGraphSnapshot = {
  version: typeof SNAPSHOT_VERSION;
  users: string[];
  groups: string[];
  userToGroup: Array<{ user: string; group: string }>;
  groupToGroup: Array<{ fromGroup: string; toGroup: string }>;
  userToComponent: Array<{ user: string; component: string; accessLevel: string }>;
  groupToComponent: Array<{ group: string; component: string; accessLevel: string }>;
  entityTypes: Array<{ entityType: string; entities: string[] }>;
  userToEntity: Array<{ user: string; entityType: string; entity: string }>;
  groupToEntity: Array<{ group: string; entityType: string; entity: string }>;
};

/**
 * A snapshot with nothing in it
 */
export function emptySnapshot(): AccessGraphSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    users: [],
    groups: [],
    userToGroup: [],
    groupToGroup: [],
    userToComponent: [],
    groupToComponent: [],
    entityTypes: [],
    userToEntity: [],
    groupToEntity: [],
  };
}
