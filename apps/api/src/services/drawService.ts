import {
  createSeededRandom,
  drawGroups,
  TooManyParticipantsError,
} from '@comidas/shared';
import type { DrawInput, DrawResult } from '@comidas/shared';

import { env } from '../config/env.js';

import { renderDrawReport } from './reportText.js';

export type SeedSource = 'manual' | 'automatic';

export type DrawRequest = DrawInput & {
  seed?: string | number;
};

export type DrawOutcome = {
  seed: string | number;
  seedSource: SeedSource;
  result: DrawResult;
  report: string;
};

export type RunDrawOptions = {
  now?: () => number;
  maxParticipants?: number;
};

const AUTOMATIC_SEED_MODULUS = 1_000_000;

export const runDraw = (request: DrawRequest, options: RunDrawOptions = {}): DrawOutcome => {
  const maxParticipants = options.maxParticipants ?? env.MAX_PARTICIPANTS;
  if (request.people.length > maxParticipants) {
    throw new TooManyParticipantsError(request.people.length, maxParticipants);
  }

  const now = options.now ?? Date.now;
  const seedSource: SeedSource = request.seed === undefined ? 'automatic' : 'manual';
  const seed = request.seed ?? now() % AUTOMATIC_SEED_MODULUS;

  const result = drawGroups(
    { people: request.people, groups: request.groups },
    { random: createSeededRandom(String(seed)) },
  );

  console.info(
    `[draw] seed=${seed} (${seedSource}) people=${result.stats.people} groups=${result.groups.length} spread=${result.stats.maxSpread}`,
  );
  for (const warning of result.warnings) {
    console.warn(
      `[draw] ${warning.groupId} over target by ${warning.overflow} (${warning.size}/${warning.targetCeiling})`,
    );
  }

  return {
    seed,
    seedSource,
    result,
    report: renderDrawReport(result, seed),
  };
};
