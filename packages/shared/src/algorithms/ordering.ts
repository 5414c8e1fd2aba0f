import type { GroupState, MealKind, Person } from '../types';

const MEAL_RANK: Record<MealKind, number> = {
  lunch: 0,
  dinner: 1,
};

export const mealRank = (meal: MealKind): number => MEAL_RANK[meal];

/** Most constrained first, input order on ties. */
export const compareByConstraintStrength = (left: Person, right: Person): number =>
  left.eligibility.size - right.eligibility.size || left.order - right.order;

type CandidateKeys = Pick<GroupState, 'meal' | 'index'> & { size: number };

export const toCandidateKeys = (group: GroupState): CandidateKeys => ({
  size: group.members.length,
  meal: group.meal,
  index: group.index,
});

/** Smallest group, then lunch before dinner, then declaration order. */
export const compareGroupCandidates = (left: CandidateKeys, right: CandidateKeys): number =>
  left.size - right.size ||
  mealRank(left.meal) - mealRank(right.meal) ||
  left.index - right.index;
