/**
 * Bounded parallel check runner
 */

import { errorMessage } from '@hook-gate/common';
import type { CheckResult, DispatchResult, NamedCheck } from './types.js';

export const DEFAULT_MAX_WORKERS = 3;

export interface RunAllOptions {
  maxWorkers?: number;
}

async function runCheck(check: NamedCheck): Promise<CheckResult> {
  try {
    const outcome = await check.run();
    return { name: check.name, passed: outcome.passed, message: outcome.message };
  } catch (error) {
    return {
      name: check.name,
      passed: false,
      message: `${check.name} check failed: ${errorMessage(error)}`,
    };
  }
}

/**
 * Run independent checks with at most `maxWorkers` in flight and wait for
 * all of them. A check that throws becomes a failing result.
 */
export async function runAll(
  checks: readonly NamedCheck[],
  options: RunAllOptions = {}
): Promise<DispatchResult> {
  const maxWorkers = Math.max(1, Math.floor(options.maxWorkers ?? DEFAULT_MAX_WORKERS));
  const results: CheckResult[] = [];
  const queue = [...checks];

  const worker = async (): Promise<void> => {
    let check = queue.shift();
    while (check) {
      results.push(await runCheck(check));
      check = queue.shift();
    }
  };

  const workers = Array.from({ length: Math.min(maxWorkers, checks.length) }, () => worker());
  await Promise.all(workers);

  return {
    results,
    passed: results.every(result => result.passed),
  };
}
