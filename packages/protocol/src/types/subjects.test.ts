// Tests for subjects

import { describe, it, expect } from 'vitest';
import { asGroup, asUser, isGroupSubject, isUserSubject, type Subject } from './subjects.js';

describe('subjects', () => {
  it('should tag users and groups by kind', () => {
    expect(asUser('mae')).toEqual({ kind: 'user', id: 'mae' });
    expect(asGroup('Sales')).toEqual({ kind: 'group', id: 'Sales' });
  });

  it('should tell users and groups apart when their keys coincide', () => {
    const subjects: Subject<string, string>[] = [asUser('Sales'), asGroup('Sales')];

    expect(subjects.map((subject) => isUserSubject(subject))).toEqual([true, false]);
    expect(subjects.map((subject) => isGroupSubject(subject))).toEqual([false, true]);
  });
});
