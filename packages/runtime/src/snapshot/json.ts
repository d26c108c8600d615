// JSON serializer
//
// Text adapters over the snapshot boundary. Where the text ends up (a
// file, a column, a cache) is the caller's business.

import { ValidationError } from '@grantgraph/protocol';
import {
  AccessManager,
  type AccessManagerOptions,
} from '../manager.js';

export type SerializeOptions = {
  /** Indentation passed to JSON.stringify */
  space?: number;
};

/**
 * Serialize the whole state of an access manager to a JSON document.
 */
export function serializeAccessManager<TUser, TGroup, TComponent, TAccess>(
  manager: AccessManager<TUser, TGroup, TComponent, TAccess>,
  options: SerializeOptions = {}
): string {
  return JSON.stringify(manager.exportSnapshot(), null, options.space);
}

/**
 * Build a new access manager from a JSON document written by
 * serializeAccessManager. The codecs in `options` must be the ones the
 * document was written with.
 *
 * @throws ValidationError if the text is not JSON or not a valid snapshot
 */
export function deserializeAccessManager<TUser, TGroup, TComponent, TAccess>(
  json: string,
  options: AccessManagerOptions<TUser, TGroup, TComponent, TAccess>
): AccessManager<TUser, TGroup, TComponent, TAccess> {
  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(
      `Snapshot is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { field: 'json' }
    );
  }

  const manager = new AccessManager(options);
  manager.importSnapshot(document);
  return manager;
}
