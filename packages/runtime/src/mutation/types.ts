// Mutation record types

/**
 * Every write the access manager accepts
 */
export type MutationOperation =
  | 'addUser'
  | 'removeUser'
  | 'addGroup'
  | 'removeGroup'
  | 'addUserToGroupMapping'
  | 'removeUserToGroupMapping'
  | 'addGroupToGroupMapping'
  | 'removeGroupToGroupMapping'
  | 'addComponentMapping'
  | 'removeComponentMapping'
  | 'addEntityType'
  | 'removeEntityType'
  | 'addEntity'
  | 'removeEntity'
  | 'addEntityMapping'
  | 'removeEntityMapping'
  | 'importSnapshot'
  | 'clear';

/**
 * What a cascading removal took with it, besides its target
 */
export type CascadeSummary = {
  edges: number;
  mappings: number;
  entities: number;
};

/**
 * A committed mutation, as handed to the `onMutation` hook.
 */
export type MutationRecord = {
  operation: MutationOperation;

  /** Arguments of the mutation, as codec keys */
  target: Record<string, string>;

  /** Present on removals that cascade */
  cascade?: CascadeSummary;

  /** When the mutation was committed */
  timestamp: string;
};
