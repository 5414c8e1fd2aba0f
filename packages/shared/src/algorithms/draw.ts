import type { Assignment, DrawInput, DrawResult, GroupState } from '../types';

import { assignGroups } from './balancedAssignment';
import type { AssignGroupsOptions } from './balancedAssignment';
import { resolveEligibility } from './eligibility';
import { planGroupSizes } from './groupSizes';
import { validateAssignment } from './validation';

export type DrawOptions = AssignGroupsOptions;

const toAssignment = (groups: readonly GroupState[]): Assignment =>
  Object.fromEntries(groups.flatMap((group) => group.members.map((member) => [member.name, group.id])));

export const drawGroups = (input: DrawInput, options: DrawOptions = {}): DrawResult => {
  const people = resolveEligibility(input.people, input.groups);
  const ceilings = planGroupSizes(people.length, input.groups);
  const { groups, warnings } = assignGroups(people, input.groups, ceilings, options);
  const report = validateAssignment(people, groups, warnings);

  return {
    groups: groups.map((group) => ({
      id: group.id,
      meal: group.meal,
      day: group.day,
      targetCeiling: group.targetCeiling,
      size: group.members.length,
      members: group.members.map((member) => member.name),
    })),
    assignment: toAssignment(groups),
    warnings: report.warnings,
    stats: report.stats,
  };
};
