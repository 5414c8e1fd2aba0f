export type MealKind = 'lunch' | 'dinner';

export type GroupDefinition = {
  id: string;
  meal: MealKind;
  day: number;
};

export type ConstraintSpec =
  | { kind: 'any' }
  | { kind: 'groups'; groups: string[] };

export type PersonInput = {
  name: string;
  constraint: ConstraintSpec;
};

export type Person = {
  readonly name: string;
  readonly eligibility: ReadonlySet<string>;
  /** Position in the input list, used as the stable tie-break. */
  readonly order: number;
};

export type GroupState = {
  id: string;
  meal: MealKind;
  day: number;
  /** Declaration index within the group list. */
  index: number;
  targetCeiling: number;
  members: Person[];
};

export type CapacityWarning = {
  groupId: string;
  targetCeiling: number;
  size: number;
  overflow: number;
};

export type Assignment = Record<string, string>;

export type GroupSummary = {
  id: string;
  meal: MealKind;
  day: number;
  targetCeiling: number;
  size: number;
  members: string[];
};

export type DrawStats = {
  people: number;
  /** Sum of |size - targetCeiling| across groups. */
  totalDeviation: number;
  /** Largest minus smallest group size, all groups together. */
  maxSpread: number;
  spreadByMeal: Record<MealKind, number>;
};

export type DrawInput = {
  people: PersonInput[];
  groups: GroupDefinition[];
};

export type DrawResult = {
  groups: GroupSummary[];
  assignment: Assignment;
  warnings: CapacityWarning[];
  stats: DrawStats;
};
