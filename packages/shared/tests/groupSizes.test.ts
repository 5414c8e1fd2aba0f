import { describe, expect, it } from 'vitest';

import { planGroupSizes } from '../src/algorithms/groupSizes';
import { DEFAULT_GROUPS } from '../src/catalog/groups';
import { NoGroupsDefinedError } from '../src/errors';
import { dinner, lunch } from './helpers';

describe('planGroupSizes', () => {
  it('gives the remainder to lunch groups in declaration order', () => {
    const ceilings = planGroupSizes(7, [lunch('L1'), lunch('L2'), dinner('D1')]);

    expect(Object.fromEntries(ceilings)).toEqual({ L1: 3, L2: 2, D1: 2 });
  });

  it('skips dinners declared before lunches', () => {
    const ceilings = planGroupSizes(3, [dinner('D1'), lunch('L1')]);

    expect(Object.fromEntries(ceilings)).toEqual({ D1: 1, L1: 2 });
  });

  it('reaches dinners only once every lunch has an extra unit', () => {
    const ceilings = planGroupSizes(8, [dinner('D1'), lunch('L1'), dinner('D2')]);

    expect(Object.fromEntries(ceilings)).toEqual({ D1: 3, L1: 3, D2: 2 });
  });

  it('splits evenly when groups divide the people count', () => {
    const ceilings = planGroupSizes(12, DEFAULT_GROUPS);

    expect(Array.from(ceilings.values())).toEqual([2, 2, 2, 2, 2, 2]);
  });

  it('plans empty groups for an empty draw', () => {
    const ceilings = planGroupSizes(0, [lunch('L1'), dinner('D1')]);

    expect(Object.fromEntries(ceilings)).toEqual({ L1: 0, D1: 0 });
  });

  it('rejects a missing group list and invalid counts', () => {
    expect(() => planGroupSizes(3, [])).toThrow(NoGroupsDefinedError);
    expect(() => planGroupSizes(-1, [lunch('L1')])).toThrow(RangeError);
    expect(() => planGroupSizes(2.5, [lunch('L1')])).toThrow(RangeError);
  });
});
