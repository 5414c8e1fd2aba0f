/**
 * Errors raised by the draw.
 *
 * `ConfigurationError` subclasses describe bad input and are shown to the user as they are.
 * `AssignmentInvariantError` means the engine itself produced an impossible result.
 */

export class ConfigurationError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownGroupReferenceError extends ConfigurationError {
  readonly personName: string;
  readonly groupId: string;

  constructor(personName: string, groupId: string) {
    super('unknown_group_reference', `${personName} references unknown group "${groupId}"`);
    this.personName = personName;
    this.groupId = groupId;
  }
}

export class NoGroupsDefinedError extends ConfigurationError {
  constructor() {
    super('no_groups_defined', 'At least one group is required');
  }
}

export class DuplicateGroupError extends ConfigurationError {
  readonly groupId: string;

  constructor(groupId: string) {
    super('duplicate_group', `Group "${groupId}" is declared more than once`);
    this.groupId = groupId;
  }
}

export class DuplicatePersonError extends ConfigurationError {
  readonly personName: string;

  constructor(personName: string) {
    super('duplicate_person', `Person "${personName}" is listed more than once`);
    this.personName = personName;
  }
}

export class EmptyConstraintError extends ConfigurationError {
  readonly personName: string;

  constructor(personName: string) {
    super('empty_constraint', `${personName} has no eligible groups`);
    this.personName = personName;
  }
}

export class EmptyDrawError extends ConfigurationError {
  constructor() {
    super('empty_draw', 'No participants were found in the message');
  }
}

export class TooManyParticipantsError extends ConfigurationError {
  readonly limit: number;

  constructor(count: number, limit: number) {
    super('too_many_participants', `${count} participants exceed the limit of ${limit}`);
    this.limit = limit;
  }
}

export type InvariantCheck = 'exactly_once' | 'eligibility' | 'balance';

export class AssignmentInvariantError extends Error {
  readonly check: InvariantCheck;

  constructor(check: InvariantCheck, message: string) {
    super(message);
    this.name = 'AssignmentInvariantError';
    this.check = check;
  }
}
