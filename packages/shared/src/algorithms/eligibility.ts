import {
  DuplicateGroupError,
  DuplicatePersonError,
  EmptyConstraintError,
  NoGroupsDefinedError,
  UnknownGroupReferenceError,
} from '../errors';
import type { GroupDefinition, Person, PersonInput } from '../types';

const resolveOne = (input: PersonInput, universe: ReadonlySet<string>): ReadonlySet<string> => {
  if (input.constraint.kind === 'any') return universe;

  if (input.constraint.groups.length === 0) {
    throw new EmptyConstraintError(input.name);
  }

  const eligibility = new Set<string>();
  for (const groupId of input.constraint.groups) {
    if (!universe.has(groupId)) {
      throw new UnknownGroupReferenceError(input.name, groupId);
    }
    eligibility.add(groupId);
  }

  return eligibility.size === universe.size ? universe : eligibility;
};

export const isFlexible = (person: Person, groupCount: number): boolean =>
  person.eligibility.size === groupCount;

export const resolveEligibility = (
  people: readonly PersonInput[],
  groups: readonly GroupDefinition[],
): Person[] => {
  if (groups.length === 0) {
    throw new NoGroupsDefinedError();
  }

  const universe = new Set<string>();
  for (const group of groups) {
    if (universe.has(group.id)) {
      throw new DuplicateGroupError(group.id);
    }
    universe.add(group.id);
  }

  const seen = new Set<string>();

  return people.map((input, order) => {
    if (seen.has(input.name)) {
      throw new DuplicatePersonError(input.name);
    }
    seen.add(input.name);

    return {
      name: input.name,
      eligibility: resolveOne(input, universe),
      order,
    };
  });
};
