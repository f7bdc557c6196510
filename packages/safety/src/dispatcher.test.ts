/**
 * Parallel dispatcher tests
 */

import { describe, it, expect } from 'vitest';
import { runAll } from './dispatcher.js';
import type { CheckOutcome, NamedCheck } from './types.js';

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function check(name: string, passed: boolean, delayMs = 0): NamedCheck {
  return {
    name,
    run: async (): Promise<CheckOutcome> => {
      await sleep(delayMs);
      return { passed, message: `${name} done` };
    },
  };
}

function names(results: Array<{ name: string }>): Set<string> {
  return new Set(results.map(result => result.name));
}

describe('runAll', () => {
  it('passes when every check passes', async () => {
    const result = await runAll([check('a', true), check('b', true), check('c', true)]);
    expect(result.passed).toBe(true);
    expect(names(result.results)).toEqual(new Set(['a', 'b', 'c']));
  });

  it('fails when any check fails', async () => {
    const result = await runAll([check('a', true), check('b', false, 5), check('c', true)]);
    expect(result.passed).toBe(false);
    expect(result.results).toHaveLength(3);
    expect(result.results.find(r => r.name === 'b')).toEqual({
      name: 'b',
      passed: false,
      message: 'b done',
    });
  });

  it('collects results in completion order', async () => {
    const result = await runAll([check('slow', true, 40), check('fast', true)]);
    expect(result.results.map(r => r.name)).toEqual(['fast', 'slow']);
  });

  it('turns a throwing check into a failing result without stopping the others', async () => {
    const result = await runAll([
      { name: 'sync-throw', run: () => { throw new Error('exploded'); } },
      { name: 'async-reject', run: async () => { throw new Error('rejected'); } },
      check('ok', true, 5),
    ]);

    expect(result.passed).toBe(false);
    expect(names(result.results)).toEqual(new Set(['sync-throw', 'async-reject', 'ok']));
    expect(result.results.find(r => r.name === 'sync-throw')?.message).toBe('sync-throw check failed: exploded');
    expect(result.results.find(r => r.name === 'async-reject')?.message).toBe('async-reject check failed: rejected');
    expect(result.results.find(r => r.name === 'ok')?.passed).toBe(true);
  });

  it('runs at most three checks at once by default', async () => {
    let active = 0;
    let maxActive = 0;
    const tracked = Array.from({ length: 7 }, (_, i): NamedCheck => ({
      name: `check-${i}`,
      run: async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await sleep(10);
        active--;
        return { passed: true, message: 'ok' };
      },
    }));

    const result = await runAll(tracked);
    expect(result.results).toHaveLength(7);
    expect(maxActive).toBe(3);
  });

  it('honours a smaller worker cap', async () => {
    let active = 0;
    let maxActive = 0;
    const tracked = Array.from({ length: 3 }, (_, i): NamedCheck => ({
      name: `check-${i}`,
      run: async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await sleep(5);
        active--;
        return { passed: true, message: 'ok' };
      },
    }));

    await runAll(tracked, { maxWorkers: 1 });
    expect(maxActive).toBe(1);
  });

  it('passes with no checks', async () => {
    expect(await runAll([])).toEqual({ results: [], passed: true });
  });
});
