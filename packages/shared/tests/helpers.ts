import type { GroupDefinition, Person, PersonInput } from '../src/types';
import type { RandomSource } from '../src/algorithms/random';

export const lunch = (id: string, day = 1): GroupDefinition => ({ id, meal: 'lunch', day });
export const dinner = (id: string, day = 1): GroupDefinition => ({ id, meal: 'dinner', day });

export const anyone = (name: string): PersonInput => ({ name, constraint: { kind: 'any' } });

export const only = (name: string, ...groups: string[]): PersonInput => ({
  name,
  constraint: { kind: 'groups', groups },
});

export const person = (name: string, eligibility: string[], order = 0): Person => ({
  name,
  eligibility: new Set(eligibility),
  order,
});

/** Replays `values` in a loop. */
export const sequenceRandom = (values: number[]): RandomSource => {
  let cursor = 0;
  return {
    next: () => {
      const value = values[cursor % values.length] ?? 0;
      cursor += 1;
      return value;
    },
  };
};
