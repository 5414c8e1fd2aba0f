import type { CapacityWarning, GroupDefinition, GroupState, Person } from '../types';

import { isFlexible } from './eligibility';
import { compareByConstraintStrength, compareGroupCandidates, toCandidateKeys } from './ordering';
import { mathRandomSource, shuffle } from './random';
import type { RandomSource } from './random';

export type AssignGroupsOptions = {
  random?: RandomSource;
  /** Draw the seating order of flexible people from `random`. Defaults to true. */
  shuffleFlexible?: boolean;
};

export type AssignGroupsResult = {
  groups: GroupState[];
  warnings: CapacityWarning[];
};

const createGroupStates = (
  groups: readonly GroupDefinition[],
  ceilings: ReadonlyMap<string, number>,
): GroupState[] =>
  groups.map((group, index) => ({
    id: group.id,
    meal: group.meal,
    day: group.day,
    index,
    targetCeiling: ceilings.get(group.id) ?? 0,
    members: [],
  }));

/** Declaration index is unique, so the ordering never leaves two groups tied. */
const pickBestGroup = (candidates: GroupState[]): GroupState => {
  let best: GroupState | undefined;

  for (const group of candidates) {
    if (!best || compareGroupCandidates(toCandidateKeys(group), toCandidateKeys(best)) < 0) {
      best = group;
    }
  }

  if (!best) {
    throw new RangeError('No candidate group available');
  }

  return best;
};

const toWarnings = (groups: GroupState[], overCapacity: ReadonlySet<string>): CapacityWarning[] =>
  groups
    .filter((group) => overCapacity.has(group.id))
    .map((group) => ({
      groupId: group.id,
      targetCeiling: group.targetCeiling,
      size: group.members.length,
      overflow: group.members.length - group.targetCeiling,
    }));

export const assignGroups = (
  people: readonly Person[],
  groups: readonly GroupDefinition[],
  ceilings: ReadonlyMap<string, number>,
  options: AssignGroupsOptions = {},
): AssignGroupsResult => {
  const random = options.random ?? mathRandomSource;
  const shuffleFlexible = options.shuffleFlexible ?? true;
  const states = createGroupStates(groups, ceilings);
  const overCapacity = new Set<string>();

  const fixed = people
    .filter((person) => !isFlexible(person, states.length))
    .sort(compareByConstraintStrength);
  const flexibleInOrder = people.filter((person) => isFlexible(person, states.length));
  const flexible = shuffleFlexible ? shuffle(flexibleInOrder, random) : flexibleInOrder;

  for (const person of fixed) {
    const eligible = states.filter((group) => person.eligibility.has(group.id));
    const chosen = pickBestGroup(eligible);

    chosen.members.push(person);
    if (chosen.members.length > chosen.targetCeiling) {
      overCapacity.add(chosen.id);
    }
  }

  for (const person of flexible) {
    const underCeiling = states.filter((group) => group.members.length < group.targetCeiling);
    const candidates = underCeiling.length > 0 ? underCeiling : states;

    pickBestGroup(candidates).members.push(person);
  }

  return {
    groups: states,
    warnings: toWarnings(states, overCapacity),
  };
};
