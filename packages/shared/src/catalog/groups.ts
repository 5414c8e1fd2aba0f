import type { GroupDefinition, MealKind } from '../types';

const MEAL_LABELS: Record<MealKind, string> = {
  lunch: 'Comida',
  dinner: 'Cena',
};

const GROUP_LABEL_RE = /^\s*(comida|cena)\s+(\d+)\s*$/i;

export const toGroupId = (meal: MealKind, day: number): string => `${MEAL_LABELS[meal]} ${day}`;

export const parseGroupLabel = (label: string): GroupDefinition | null => {
  const match = GROUP_LABEL_RE.exec(label);
  if (!match) return null;

  const [, kind = '', dayText = ''] = match;
  const meal: MealKind = kind.toLowerCase() === 'cena' ? 'dinner' : 'lunch';
  const day = Number.parseInt(dayText, 10);

  return { id: toGroupId(meal, day), meal, day };
};

const group = (meal: MealKind, day: number): GroupDefinition => ({
  id: toGroupId(meal, day),
  meal,
  day,
});

/** The six slots of the usual four-day event, in declaration order. */
export const DEFAULT_GROUPS: readonly GroupDefinition[] = [
  group('lunch', 9),
  group('dinner', 9),
  group('lunch', 10),
  group('dinner', 10),
  group('lunch', 11),
  group('lunch', 12),
];
