import { NoGroupsDefinedError } from '../errors';
import type { GroupDefinition } from '../types';

import { mealRank } from './ordering';

/**
 * Target ceiling per group. Everyone gets `floor(N / G)`; the remainder is handed
 * out one unit at a time to lunches in declaration order, then to dinners.
 */
export const planGroupSizes = (
  totalPeople: number,
  groups: readonly GroupDefinition[],
): Map<string, number> => {
  if (groups.length === 0) {
    throw new NoGroupsDefinedError();
  }

  if (!Number.isInteger(totalPeople) || totalPeople < 0) {
    throw new RangeError(`Invalid people count: ${totalPeople}`);
  }

  const base = Math.floor(totalPeople / groups.length);
  let remainder = totalPeople % groups.length;

  const ceilings = new Map(groups.map((group) => [group.id, base]));

  const remainderOrder = groups
    .map((group, index) => ({ group, index }))
    .sort((left, right) => mealRank(left.group.meal) - mealRank(right.group.meal) || left.index - right.index);

  for (const { group } of remainderOrder) {
    if (remainder === 0) break;
    ceilings.set(group.id, base + 1);
    remainder -= 1;
  }

  return ceilings;
};
