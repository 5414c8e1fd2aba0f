import { describe, expect, it } from 'vitest';

import { isFlexible, resolveEligibility } from '../src/algorithms/eligibility';
import {
  DuplicateGroupError,
  DuplicatePersonError,
  EmptyConstraintError,
  NoGroupsDefinedError,
  UnknownGroupReferenceError,
} from '../src/errors';
import { anyone, dinner, lunch, only } from './helpers';

const groups = [lunch('Comida 9', 9), dinner('Cena 9', 9), lunch('Comida 10', 10)];

describe('resolveEligibility', () => {
  it('expands unrestricted people to every group', () => {
    const [ana] = resolveEligibility([anyone('Ana')], groups);

    expect(Array.from(ana?.eligibility ?? [])).toEqual(['Comida 9', 'Cena 9', 'Comida 10']);
    expect(ana && isFlexible(ana, groups.length)).toBe(true);
  });

  it('restricts people to the named groups and keeps input order', () => {
    const people = resolveEligibility([anyone('Ana'), only('Luis', 'Cena 9'), only('Marta', 'Comida 9', 'Comida 10')], groups);

    expect(people.map((entry) => [entry.name, entry.order, entry.eligibility.size])).toEqual([
      ['Ana', 0, 3],
      ['Luis', 1, 1],
      ['Marta', 2, 2],
    ]);
    expect(people[1]?.eligibility.has('Cena 9')).toBe(true);
  });

  it('treats a constraint naming every group as unrestricted', () => {
    const [ana] = resolveEligibility([only('Ana', 'Comida 10', 'Cena 9', 'Comida 9')], groups);

    expect(ana && isFlexible(ana, groups.length)).toBe(true);
  });

  it('fails on a reference to an unknown group', () => {
    const run = () => resolveEligibility([anyone('Ana'), only('Luis', 'Cena 12')], groups);

    expect(run).toThrow(UnknownGroupReferenceError);
    expect(run).toThrow('Luis references unknown group "Cena 12"');
  });

  it('fails without groups', () => {
    expect(() => resolveEligibility([anyone('Ana')], [])).toThrow(NoGroupsDefinedError);
  });

  it('rejects duplicate people and duplicate groups', () => {
    expect(() => resolveEligibility([anyone('Ana'), anyone('Ana')], groups)).toThrow(DuplicatePersonError);
    expect(() => resolveEligibility([anyone('Ana')], [...groups, lunch('Comida 9', 9)])).toThrow(DuplicateGroupError);
  });

  it('rejects an empty restriction', () => {
    expect(() => resolveEligibility([only('Ana')], groups)).toThrow(EmptyConstraintError);
  });
});
