import { DEFAULT_GROUPS, EmptyDrawError, parseGroupLabel } from '@comidas/shared';
import type { GroupDefinition, PersonInput } from '@comidas/shared';

const TODO_RE = /^\s*todo\s*:\s*$/i;
const HEADER_RE = /^\s*-\s*(.+)$/;
const BULLET_RE = /^[-•*]\s*/;

export type ParsedSignup = {
  people: PersonInput[];
  groups: GroupDefinition[];
};

type Section = { kind: 'any' } | { kind: 'group'; groupId: string } | null;

type Entry = {
  unrestricted: boolean;
  groups: string[];
};

export const normalizeName = (raw: string): string =>
  raw.trim().replace(BULLET_RE, '').replace(/\s+/g, ' ').trim();

const readHeader = (line: string): GroupDefinition | null => {
  const match = HEADER_RE.exec(line);
  return match?.[1] ? parseGroupLabel(match[1]) : null;
};

/**
 * Reads the sign-up message: a `TODO:` block of people who can go anywhere, then one
 * `- Comida N` / `- Cena N` block per group. A name under several headers may go to any
 * of them; a name in `TODO:` may go anywhere.
 */
export const parseSignupMessage = (
  message: string,
  baseGroups: readonly GroupDefinition[] = DEFAULT_GROUPS,
): ParsedSignup => {
  const groups = [...baseGroups];
  const knownGroups = new Set(groups.map((group) => group.id));
  const entries = new Map<string, Entry>();
  let section: Section = null;

  for (const line of message.split(/\r?\n/)) {
    if (!line.trim()) continue;

    if (TODO_RE.test(line)) {
      section = { kind: 'any' };
      continue;
    }

    const header = readHeader(line);
    if (header) {
      if (!knownGroups.has(header.id)) {
        knownGroups.add(header.id);
        groups.push(header);
      }
      section = { kind: 'group', groupId: header.id };
      continue;
    }

    const name = normalizeName(line);
    if (!name || !section) continue;

    const entry = entries.get(name) ?? { unrestricted: false, groups: [] };
    if (section.kind === 'any') {
      entry.unrestricted = true;
    } else if (!entry.groups.includes(section.groupId)) {
      entry.groups.push(section.groupId);
    }
    entries.set(name, entry);
  }

  if (entries.size === 0) {
    throw new EmptyDrawError();
  }

  const people = Array.from(entries, ([name, entry]): PersonInput => ({
    name,
    constraint: entry.unrestricted ? { kind: 'any' } : { kind: 'groups', groups: entry.groups },
  }));

  return { people, groups };
};
