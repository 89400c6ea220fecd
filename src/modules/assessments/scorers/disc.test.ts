import { ResponseValidationError } from '../errors';
import { behavioralPattern, scoreDisc } from './disc';

type DiscPick = { most_like_me: string; least_like_me: string };

const fromPairs = (pairs: [string, string][]) => {
  const raw: Record<string, DiscPick> = {};
  pairs.forEach(([most, least], idx) => {
    raw[String(idx + 1)] = { most_like_me: most, least_like_me: least };
  });
  return raw;
};

const repeat = (pair: [string, string], times: number): [string, string][] => Array.from({ length: times }, () => pair);

describe('scoreDisc', () => {
  it('computes the three profiles for an all-D/C respondent', () => {
    const result = scoreDisc(fromPairs(repeat(['D', 'C'], 24)));

    expect(result.profiles.adaptive.scores).toEqual({ D: 24, I: 0, S: 0, C: 0 });
    expect(result.profiles.natural.scores).toEqual({ D: 0, I: 0, S: 0, C: 24 });
    expect(result.profiles.perceived.scores).toEqual({ D: 24, I: 0, S: 0, C: -24 });
    expect(result.final_behavioral_pattern).toMatchObject({ id: 'D', name: 'Dominance' });
    expect(result.stress_analysis).toMatchObject({ score: 48, level: 'high', threshold: 10 });
    expect(result.stress_analysis.interpretation.startsWith('Instinctive behavior differs markedly')).toBe(true);
  });

  it('resolves a clear D profile', () => {
    const result = scoreDisc(
      fromPairs([
        ['D', 'I'], ['D', 'S'], ['D', 'C'], ['D', 'I'], ['D', 'S'], ['D', 'C'],
        ['D', 'I'], ['D', 'S'], ['D', 'C'], ['D', 'I'], ['D', 'S'], ['D', 'C'],
        ['I', 'D'], ['S', 'D'], ['C', 'D'], ['I', 'D'], ['S', 'D'], ['C', 'D'],
        ['I', 'S'], ['S', 'C'], ['C', 'I'], ['I', 'S'], ['S', 'C'], ['C', 'I'],
      ])
    );

    expect(result.profiles.perceived.scores).toEqual({ D: 6, I: -2, S: -2, C: -2 });
    expect(result.final_behavioral_pattern.id).toBe('D');
  });

  it('combines close top letters into an IS pattern', () => {
    const result = scoreDisc(
      fromPairs([
        ...repeat(['I', 'D'], 4),
        ...repeat(['I', 'C'], 4),
        ...repeat(['S', 'D'], 4),
        ...repeat(['S', 'C'], 4),
        ...repeat(['D', 'I'], 2),
        ...repeat(['D', 'S'], 2),
        ...repeat(['C', 'I'], 2),
        ...repeat(['C', 'S'], 2),
      ])
    );

    expect(result.profiles.perceived.scores).toEqual({ D: -4, I: 4, S: 4, C: -4 });
    expect(result.final_behavioral_pattern).toMatchObject({ id: 'IS', name: 'Counselor' });
    expect(result.stress_analysis).toMatchObject({ score: 16, level: 'high' });
  });

  it('flags high stress when adapted and natural styles diverge', () => {
    const result = scoreDisc(fromPairs([...repeat(['D', 'C'], 12), ...repeat(['I', 'S'], 12)]));
    expect(result.final_behavioral_pattern.id).toBe('DI');
    expect(result.stress_analysis.score).toBe(48);
    expect(result.stress_analysis.level).toBe('high');
  });

  it('reports low stress for a balanced respondent', () => {
    const result = scoreDisc(
      fromPairs([...repeat(['D', 'I'], 6), ...repeat(['I', 'S'], 6), ...repeat(['S', 'C'], 6), ...repeat(['C', 'D'], 6)])
    );
    expect(result.profiles.perceived.scores).toEqual({ D: 0, I: 0, S: 0, C: 0 });
    expect(result.stress_analysis).toMatchObject({ score: 0, level: 'low' });
    expect(result.stress_analysis.interpretation.startsWith('Instinctive and adapted behavior are close')).toBe(true);
    expect(result.final_behavioral_pattern.id).toBe('CD');
  });

  it('requires exactly 24 responses', () => {
    const raw = fromPairs(repeat(['D', 'C'], 23));
    expect(() => scoreDisc(raw)).toThrow(ResponseValidationError);
    expect(() => scoreDisc(raw)).toThrow('Expected 24 DISC responses, received 23');
    expect(() => scoreDisc(fromPairs(repeat(['D', 'C'], 25)))).toThrow('Expected 24 DISC responses, received 25');
  });

  it('rejects identical or missing letters', () => {
    const raw: Record<string, unknown> = fromPairs(repeat(['D', 'C'], 24));
    raw['1'] = { most_like_me: 'S', least_like_me: 'S' };
    raw['2'] = { most_like_me: 'I' };

    try {
      scoreDisc(raw);
      throw new Error('expected a validation error');
    } catch (err) {
      expect(err).toBeInstanceOf(ResponseValidationError);
      if (!(err instanceof ResponseValidationError)) return;
      expect(err.details.issues).toEqual([
        'question 1: most_like_me and least_like_me must differ',
        'question 2: least_like_me Required',
      ]);
    }
  });

  it('rejects letters outside DISC', () => {
    const raw: Record<string, unknown> = fromPairs(repeat(['D', 'C'], 24));
    raw['5'] = { most_like_me: 'X', least_like_me: 'C' };
    expect(() => scoreDisc(raw)).toThrow(/^Invalid DISC responses: question 5: most_like_me /);
  });
});

describe('behavioralPattern', () => {
  it('keeps a single letter when the lead is larger than two', () => {
    expect(behavioralPattern({ D: 2, I: 5, S: 1, C: 0 }).id).toBe('I');
  });

  it('orders combined letters by score', () => {
    expect(behavioralPattern({ D: 1, I: 0, S: 5, C: 3 }).id).toBe('SC');
    expect(behavioralPattern({ D: 4, I: 0, S: 1, C: 5 }).id).toBe('CD');
  });
});
