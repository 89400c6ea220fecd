import path from 'path';
import fs from 'fs/promises';
import { calculateScores } from './modules/assessments/scoring';

export const USAGE = 'Usage: npm run score -- <instrument> <responses.json>';

export type CliOutput = {
  log(line: string): void;
  error(line: string): void;
};

/** Scores one JSON response file and prints the result; resolves to the exit code. */
export async function runScoreCommand(args: string[], output: CliOutput = console): Promise<number> {
  const [instrument, file] = args;
  if (!instrument || !file) {
    output.error(USAGE);
    return 1;
  }

  const contents = await fs.readFile(path.resolve(file), 'utf8');
  let rawResponses: unknown;
  try {
    rawResponses = JSON.parse(contents);
  } catch (err) {
    output.error(`Could not parse ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const result = calculateScores(instrument, rawResponses);
  output.log(JSON.stringify(result, null, 2));
  return result.status === 'error' ? 1 : 0;
}
