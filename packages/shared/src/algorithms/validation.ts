import { AssignmentInvariantError } from '../errors';
import type { CapacityWarning, DrawStats, GroupState, MealKind, Person } from '../types';

export type ValidationReport = {
  warnings: CapacityWarning[];
  stats: DrawStats;
};

const spreadOf = (sizes: number[]): number =>
  sizes.length === 0 ? 0 : Math.max(...sizes) - Math.min(...sizes);

const spreadForMeal = (groups: readonly GroupState[], meal: MealKind): number =>
  spreadOf(groups.filter((group) => group.meal === meal).map((group) => group.members.length));

const checkExactlyOnce = (people: readonly Person[], groups: readonly GroupState[]): Map<string, GroupState> => {
  const groupByPerson = new Map<string, GroupState>();

  for (const group of groups) {
    for (const member of group.members) {
      const previous = groupByPerson.get(member.name);
      if (previous) {
        throw new AssignmentInvariantError(
          'exactly_once',
          `${member.name} was assigned to both ${previous.id} and ${group.id}`,
        );
      }
      groupByPerson.set(member.name, group);
    }
  }

  const expected = new Set(people.map((person) => person.name));
  for (const name of groupByPerson.keys()) {
    if (!expected.has(name)) {
      throw new AssignmentInvariantError('exactly_once', `${name} was assigned but is not a participant`);
    }
  }

  for (const person of people) {
    if (!groupByPerson.has(person.name)) {
      throw new AssignmentInvariantError('exactly_once', `${person.name} was not assigned to any group`);
    }
  }

  return groupByPerson;
};

export const validateAssignment = (
  people: readonly Person[],
  groups: readonly GroupState[],
  warnings: readonly CapacityWarning[],
): ValidationReport => {
  const groupByPerson = checkExactlyOnce(people, groups);

  for (const person of people) {
    const group = groupByPerson.get(person.name);
    if (group && !person.eligibility.has(group.id)) {
      throw new AssignmentInvariantError('eligibility', `${person.name} cannot attend ${group.id}`);
    }
  }

  const spreadByMeal: Record<MealKind, number> = {
    lunch: spreadForMeal(groups, 'lunch'),
    dinner: spreadForMeal(groups, 'dinner'),
  };

  // Overflows from hard constraints void the balance guarantee.
  if (warnings.length === 0) {
    for (const [meal, spread] of Object.entries(spreadByMeal)) {
      if (spread > 1) {
        throw new AssignmentInvariantError('balance', `${meal} groups differ in size by ${spread}`);
      }
    }
  }

  return {
    warnings: [...warnings],
    stats: {
      people: people.length,
      totalDeviation: groups.reduce(
        (sum, group) => sum + Math.abs(group.members.length - group.targetCeiling),
        0,
      ),
      maxSpread: spreadOf(groups.map((group) => group.members.length)),
      spreadByMeal,
    },
  };
};
