import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { runScoreCommand, USAGE } from './cli';

const captureOutput = () => {
  const logs: string[] = [];
  const errors: string[] = [];
  return { logs, errors, output: { log: (line: string) => logs.push(line), error: (line: string) => errors.push(line) } };
};

describe('runScoreCommand', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'score-cli-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeJson = async (name: string, contents: string) => {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, contents, 'utf8');
    return filePath;
  };

  it('prints the scored result and exits with 0', async () => {
    const raw: Record<string, { response: string }> = {};
    for (let i = 1; i <= 60; i++) raw[String(i)] = { response: 'a' };
    const file = await writeJson('mbti.json', JSON.stringify(raw));
    const { logs, errors, output } = captureOutput();

    const code = await runScoreCommand(['MBTI', file], output);

    expect(code).toBe(0);
    expect(errors).toEqual([]);
    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0])).toMatchObject({ status: 'success', instrument: 'mbti', mbti_type: 'ISTP' });
  });

  it('prints the error envelope and exits with 1 when scoring fails', async () => {
    const file = await writeJson('disc.json', JSON.stringify({ '1': { most_like_me: 'D', least_like_me: 'C' } }));
    const { logs, output } = captureOutput();

    const code = await runScoreCommand(['disc', file], output);

    expect(code).toBe(1);
    expect(JSON.parse(logs[0])).toEqual({
      status: 'error',
      message: 'Expected 24 DISC responses, received 1',
      details: { issues: ['Expected 24 DISC responses, received 1'] },
    });
  });

  it('shows usage when arguments are missing', async () => {
    const { logs, errors, output } = captureOutput();

    expect(await runScoreCommand(['mbti'], output)).toBe(1);
    expect(errors).toEqual([USAGE]);
    expect(logs).toEqual([]);
  });

  it('exits with 1 on a file that is not JSON', async () => {
    const file = await writeJson('broken.json', '{ not json');
    const { logs, errors, output } = captureOutput();

    expect(await runScoreCommand(['pvq', file], output)).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith(`Could not parse ${file}: `)).toBe(true);
    expect(logs).toEqual([]);
  });
});
