import { readFile } from 'node:fs/promises';
import { createInterface } from 'node:readline';

import { ConfigurationError } from '@comidas/shared';

import { runDraw } from '../services/drawService.js';
import { parseSignupMessage } from '../services/messageParser.js';

type CliArgs = {
  file?: string;
  seed?: string;
};

const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {};

  for (let index = 0; index < argv.length; index += 1) {
    const value = argv[index];
    if (value === '--seed') {
      args.seed = argv[index + 1];
      index += 1;
    } else if (value) {
      args.file = value;
    }
  }

  return args;
};

/** Reads until a line `FIN`, two blank lines in a row, or end of input. */
const readFromStdin = async (): Promise<string> => {
  console.log('Pega aquí el mensaje completo.');
  console.log('Para terminar: dos líneas en blanco seguidas, o FIN en una línea sola.\n');

  const reader = createInterface({ input: process.stdin });
  const lines: string[] = [];
  let blankLines = 0;

  for await (const line of reader) {
    if (line.trim() === 'FIN') break;

    if (line.trim() === '') {
      blankLines += 1;
      if (blankLines >= 2) break;
    } else {
      blankLines = 0;
    }

    lines.push(line);
  }

  reader.close();
  return lines.join('\n').trim();
};

const seedFromArg = (raw: string | undefined): string | number | undefined => {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : trimmed;
};

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const message = args.file ? await readFile(args.file, 'utf8') : await readFromStdin();

  const signup = parseSignupMessage(message);
  const outcome = runDraw({ ...signup, seed: seedFromArg(args.seed) });

  console.log(`\n${outcome.report}`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error('[unhandled-error]', error);
  }
  process.exitCode = 1;
});
