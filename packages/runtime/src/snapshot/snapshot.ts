// Snapshot export and loading
//
// Turns the stores into a key-encoded AccessGraphSnapshot and back. Loading
// replays the snapshot through the same mutations a caller would use, so
// every reference in it is checked the usual way.

import {
  ValidationError,
  asGroup,
  asUser,
  emptySnapshot,
  type AccessGraphCodecs,
  type AccessGraphSnapshot,
  type KeyCodec,
  type Subject,
} from '@grantgraph/protocol';
import type { StoreContext } from '@grantgraph/repositories';

/**
 * Write a snapshot of everything in the stores. Users, groups, entity types
 * and their edges and mappings appear in insertion order.
 */
export function exportSnapshot<TUser, TGroup, TComponent, TAccess>(
  stores: StoreContext<TUser, TGroup, TComponent, TAccess>
): AccessGraphSnapshot {
  const { graph, mappings, codecs } = stores;
  const snapshot = emptySnapshot();

  for (const user of graph.users()) {
    const userKey = codecs.user.toKey(user);
    snapshot.users.push(userKey);
    for (const group of graph.groupsOfUser(user)) {
      snapshot.userToGroup.push({ user: userKey, group: codecs.group.toKey(group) });
    }
    for (const pair of mappings.componentMappingsOf(asUser(user))) {
      snapshot.userToComponent.push({
        user: userKey,
        component: codecs.component.toKey(pair.component),
        accessLevel: codecs.accessLevel.toKey(pair.accessLevel),
      });
    }
    for (const ref of mappings.allEntityMappingsOf(asUser(user))) {
      snapshot.userToEntity.push({ user: userKey, ...ref });
    }
  }

  for (const group of graph.groups()) {
    const groupKey = codecs.group.toKey(group);
    snapshot.groups.push(groupKey);
    for (const toGroup of graph.groupsOfGroup(group)) {
      snapshot.groupToGroup.push({ fromGroup: groupKey, toGroup: codecs.group.toKey(toGroup) });
    }
    for (const pair of mappings.componentMappingsOf(asGroup(group))) {
      snapshot.groupToComponent.push({
        group: groupKey,
        component: codecs.component.toKey(pair.component),
        accessLevel: codecs.accessLevel.toKey(pair.accessLevel),
      });
    }
    for (const ref of mappings.allEntityMappingsOf(asGroup(group))) {
      snapshot.groupToEntity.push({ group: groupKey, ...ref });
    }
  }

  for (const entityType of mappings.entityTypes()) {
    snapshot.entityTypes.push({ entityType, entities: mappings.entitiesOf(entityType) });
  }

  return snapshot;
}

/**
 * The writes a snapshot is replayed through
 */
export interface SnapshotLoadTarget<TUser, TGroup, TComponent, TAccess> {
  addUser(user: TUser): unknown;
  addGroup(group: TGroup): unknown;
  addUserToGroupMapping(user: TUser, group: TGroup): unknown;
  addGroupToGroupMapping(fromGroup: TGroup, toGroup: TGroup): unknown;
  addComponentMapping(subject: Subject<TUser, TGroup>, component: TComponent, accessLevel: TAccess): unknown;
  addEntityType(entityType: string): unknown;
  addEntity(entityType: string, entity: string): unknown;
  addEntityMapping(subject: Subject<TUser, TGroup>, entityType: string, entity: string): unknown;
}

/**
 * Replay a snapshot into `target`. The target is expected to be empty, and
 * the caller is expected to run this inside a transaction.
 *
 * @throws ValidationError if a key cannot be decoded
 * @throws whatever the target throws for a bad reference
 */
export function loadSnapshot<TUser, TGroup, TComponent, TAccess>(
  target: SnapshotLoadTarget<TUser, TGroup, TComponent, TAccess>,
  codecs: AccessGraphCodecs<TUser, TGroup, TComponent, TAccess>,
  snapshot: AccessGraphSnapshot
): void {
  const user = (key: string, path: string) => decodeKey(codecs.user, key, path);
  const group = (key: string, path: string) => decodeKey(codecs.group, key, path);

  snapshot.users.forEach((key, i) => target.addUser(user(key, `users.${i}`)));
  snapshot.groups.forEach((key, i) => target.addGroup(group(key, `groups.${i}`)));

  for (const { entityType, entities } of snapshot.entityTypes) {
    target.addEntityType(entityType);
    for (const entity of entities) {
      target.addEntity(entityType, entity);
    }
  }

  snapshot.userToGroup.forEach((edge, i) =>
    target.addUserToGroupMapping(
      user(edge.user, `userToGroup.${i}.user`),
      group(edge.group, `userToGroup.${i}.group`)
    )
  );
  snapshot.groupToGroup.forEach((edge, i) =>
    target.addGroupToGroupMapping(
      group(edge.fromGroup, `groupToGroup.${i}.fromGroup`),
      group(edge.toGroup, `groupToGroup.${i}.toGroup`)
    )
  );

  snapshot.userToComponent.forEach((mapping, i) =>
    target.addComponentMapping(
      asUser(user(mapping.user, `userToComponent.${i}.user`)),
      decodeKey(codecs.component, mapping.component, `userToComponent.${i}.component`),
      decodeKey(codecs.accessLevel, mapping.accessLevel, `userToComponent.${i}.accessLevel`)
    )
  );
  snapshot.groupToComponent.forEach((mapping, i) =>
    target.addComponentMapping(
      asGroup(group(mapping.group, `groupToComponent.${i}.group`)),
      decodeKey(codecs.component, mapping.component, `groupToComponent.${i}.component`),
      decodeKey(codecs.accessLevel, mapping.accessLevel, `groupToComponent.${i}.accessLevel`)
    )
  );

  snapshot.userToEntity.forEach((mapping, i) =>
    target.addEntityMapping(
      asUser(user(mapping.user, `userToEntity.${i}.user`)),
      mapping.entityType,
      mapping.entity
    )
  );
  snapshot.groupToEntity.forEach((mapping, i) =>
    target.addEntityMapping(
      asGroup(group(mapping.group, `groupToEntity.${i}.group`)),
      mapping.entityType,
      mapping.entity
    )
  );
}

function decodeKey<T>(codec: KeyCodec<T>, key: string, path: string): T {
  try {
    return codec.fromKey(key);
  } catch (error) {
    throw new ValidationError(
      `Snapshot key '${key}' at ${path} cannot be decoded: ${error instanceof Error ? error.message : String(error)}`,
      { field: path, details: { key } }
    );
  }
}
