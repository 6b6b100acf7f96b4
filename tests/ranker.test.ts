import { describe, it, expect } from 'vitest';
import { rankKeyed, rankFlat, type CandidateEntry } from '../src/ranker.js';

interface Member {
  kind: string;
  type: string;
}

const field = (type: string): Member => ({ kind: 'field', type });

describe('rankKeyed', () => {
  it('ranks the intended name first', () => {
    const pool: CandidateEntry<Member>[] = [
      ['firstName', field('string')],
      ['lastName', field('string')],
      ['fullName', field('string')],
      ['username', field('string')],
    ];

    const result = rankKeyed('frstName', pool);

    expect(result.map(r => r.name)).toEqual(['firstName', 'lastName', 'fullName', 'username']);
    expect(result[0].score).toBeCloseTo(1.1566666666666667, 10);
    expect(result[1].score).toBeCloseTo(1.0333333333333334, 10);
    expect(result[2].score).toBeCloseTo(0.975, 10);
    expect(result[3].score).toBeCloseTo(0.7777777777777778, 10);
  });

  it('passes payloads through untouched', () => {
    const payload = field('int');
    const result = rankKeyed('cont', [['count', payload]]);
    expect(result[0].value).toBe(payload);
  });

  it('accepts a Map', () => {
    const pool = new Map<string, number>([['counter', 1], ['total', 2]]);
    const result = rankKeyed('countr', pool);
    expect(result[0]).toMatchObject({ name: 'counter', value: 1 });
  });

  it('never suggests the unknown name itself', () => {
    const result = rankKeyed('count', [['count', 1], ['Count', 2], ['counter', 3]]);

    expect(result.map(r => r.name)).toEqual(['Count', 'counter']);
    expect(result.map(r => r.value)).toEqual([2, 3]);
    expect(result[0].score).toBeCloseTo(1.7, 10);
    expect(result[1].score).toBeCloseTo(1.2228571428571429, 10);
  });

  it('returns at most 5 results sorted by descending score', () => {
    const pool: CandidateEntry<number>[] = Array.from({ length: 12 }, (_, i) => [`item${i + 1}`, i]);
    const result = rankKeyed('itemm', pool);

    expect(result.length).toBe(5);
    for (let i = 1; i < result.length; i++) {
      expect(result[i].score).toBeLessThanOrEqual(result[i - 1].score);
    }
  });

  it('honours a custom limit', () => {
    const pool: CandidateEntry<null>[] = [['alpha', null], ['alpine', null], ['alps', null]];
    expect(rankKeyed('alp', pool, { limit: 2 }).length).toBe(2);
    expect(rankKeyed('alp', pool, { limit: 0 })).toEqual([]);
  });

  it('keeps input order for equal scores', () => {
    expect(rankKeyed('ab', [['abX', 1], ['abY', 2]]).map(r => r.value)).toEqual([1, 2]);
    expect(rankKeyed('ab', [['abY', 2], ['abX', 1]]).map(r => r.value)).toEqual([2, 1]);
  });

  it('discards entries with null or empty keys', () => {
    const result = rankKeyed<string>('vlid', [[null, 'a'], ['', 'b'], [undefined, 'c'], ['valid', 'd']]);
    expect(result.map(r => r.name)).toEqual(['valid']);
  });

  it('returns an empty list for empty input', () => {
    expect(rankKeyed<number>('query', [])).toEqual([]);
    expect(rankKeyed<number>('query', null)).toEqual([]);
    expect(rankKeyed<number>('query', undefined)).toEqual([]);
    expect(rankKeyed<number>('query', [[null, 1], ['', 2]])).toEqual([]);
    expect(rankKeyed('', [['query', 1]])).toEqual([]);
    expect(rankKeyed(null, [['query', 1]])).toEqual([]);
  });

  it('applies no score cutoff', () => {
    const result = rankKeyed('qqq', [['zzz', 1]]);
    expect(result).toEqual([{ name: 'zzz', value: 1, score: 0 }]);
  });
});

describe('rankFlat', () => {
  it('finds the intended name', () => {
    const result = rankFlat('UpdatUser', ['DeleteUser', 'UpdateUserAsync', 'UpdateUser', 'GetUser']);
    expect(result[0].name).toBe('UpdateUser');
  });

  it('skips null and empty entries', () => {
    const result = rankFlat('vlidSymbol', [null, '', undefined, 'validSymbol']);
    expect(result.map(r => r.name)).toEqual(['validSymbol']);
  });

  it('keeps a candidate equal to the unknown name', () => {
    const result = rankFlat('count', ['counter', 'count']);
    expect(result.map(r => r.name)).toEqual(['count', 'counter']);
    expect(result[0].score).toBeCloseTo(1.7, 10);
  });

  it('returns at most 5 results sorted by descending score', () => {
    const names = Array.from({ length: 10 }, (_, i) => `value${i}`);
    const result = rankFlat('valu', names);

    expect(result.length).toBe(5);
    for (let i = 1; i < result.length; i++) {
      expect(result[i].score).toBeLessThanOrEqual(result[i - 1].score);
    }
  });

  it('accepts any iterable', () => {
    const result = rankFlat('alph', new Set(['alpha', 'beta']));
    expect(result.map(r => r.name)).toEqual(['alpha', 'beta']);
  });

  it('returns an empty list for empty input', () => {
    expect(rankFlat('query', [])).toEqual([]);
    expect(rankFlat('query', null)).toEqual([]);
    expect(rankFlat('query', [null, ''])).toEqual([]);
    expect(rankFlat(null, ['query'])).toEqual([]);
    expect(rankFlat('', ['query'])).toEqual([]);
  });
});
