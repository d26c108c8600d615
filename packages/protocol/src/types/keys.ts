// Key codecs - equality and hashing for caller-chosen types
//
// Users, groups, components and access levels are caller-typed. The stores
// never compare those values directly: every value is turned into a string
// key by its codec, and maps/sets are indexed by that key.

/**
 * Converts values of a type to and from a string that uniquely identifies them.
 *
 * `toKey` must be deterministic and injective (two values are equal exactly
 * when their keys are equal). `fromKey` must invert `toKey`; it is only
 * needed when reading snapshots back in.
 */
export interface KeyCodec<T> {
  toKey(value: T): string;
  fromKey(key: string): T;
}

/**
 * Codecs for the four caller-chosen type parameters of an access manager.
 */
export type AccessGraphCodecs<TUser, TGroup, TComponent, TAccess> = {
  user: KeyCodec<TUser>;
  group: KeyCodec<TGroup>;
  component: KeyCodec<TComponent>;
  accessLevel: KeyCodec<TAccess>;
};

/**
 * Identity codec for string keys.
 */
export const stringCodec: KeyCodec<string> = {
  toKey: (value) => value,
  fromKey: (key) => key,
};

/**
 * Codec for finite numbers.
 */
export const numberCodec: KeyCodec<number> = {
  toKey(value) {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Number key must be finite, got ${value}`);
    }
    return String(value);
  },
  fromKey(key) {
    const value = Number(key);
    if (key.trim() === '' || !Number.isFinite(value)) {
      throw new TypeError(`"${key}" is not a number key`);
    }
    return value;
  },
};

/**
 * Create a codec for a closed set of string members, e.g. a string enum or
 * an `as const` tuple. Decoding rejects anything outside the set.
 *
 * @example
 * ```typescript
 * const AccessLevels = ['View', 'Create', 'Modify', 'Delete'] as const;
 * type AccessLevel = (typeof AccessLevels)[number];
 * const accessLevelCodec = createEnumCodec<AccessLevel>(AccessLevels);
 * ```
 */
export function createEnumCodec<T extends string>(members: readonly T[]): KeyCodec<T> {
  const known = new Set<string>(members);
  const isMember = (key: string): key is T => known.has(key);

  return {
    toKey(value) {
      if (!isMember(value)) {
        throw new TypeError(`"${value}" is not one of: ${members.join(', ')}`);
      }
      return value;
    },
    fromKey(key) {
      if (!isMember(key)) {
        throw new TypeError(`"${key}" is not one of: ${members.join(', ')}`);
      }
      return key;
    },
  };
}

/**
 * Codecs for an access graph whose four type parameters are all strings.
 */
export const stringCodecs: AccessGraphCodecs<string, string, string, string> = {
  user: stringCodec,
  group: stringCodec,
  component: stringCodec,
  accessLevel: stringCodec,
};
