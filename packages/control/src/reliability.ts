/**
 * ReliabilityTracker - Attempt and success counters per channel and target
 *
 * Counters only ever grow. Switch targets are named `SWITCH_<port>`.
 */

import type { Port } from '@hubcast/types';

export interface ReliabilityCounter {
  attempts: number;
  successes: number;
}

export interface ReliabilityStats extends ReliabilityCounter {
  /** Percent, one decimal */
  successRate: number;
}

export type SwitchTarget = `SWITCH_${Port}`;

export function switchTarget(port: Port): SwitchTarget {
  return `SWITCH_${port}`;
}

/** successes / attempts × 100; 0 before the first attempt. */
export function successRate(counter: ReliabilityCounter): number {
  if (counter.attempts === 0) return 0;
  return (counter.successes / counter.attempts) * 100;
}

export class ReliabilityTracker {
  private counters = new Map<number, Map<string, ReliabilityCounter>>();

  recordAttempt(channel: number, target: string): void {
    this.counter(channel, target).attempts++;
  }

  recordSuccess(channel: number, target: string): void {
    this.counter(channel, target).successes++;
  }

  get(channel: number, target: string): ReliabilityCounter {
    const counter = this.counters.get(channel)?.get(target);
    return counter ? { ...counter } : { attempts: 0, successes: 0 };
  }

  rate(channel: number, target: string): number {
    return successRate(this.get(channel, target));
  }

  /** All targets tracked for `channel`, with rates rounded to one decimal. */
  snapshot(channel: number): Record<string, ReliabilityStats> {
    const result: Record<string, ReliabilityStats> = {};
    for (const [target, counter] of this.counters.get(channel) ?? []) {
      result[target] = {
        ...counter,
        successRate: Math.round(successRate(counter) * 10) / 10,
      };
    }
    return result;
  }

  private counter(channel: number, target: string): ReliabilityCounter {
    let targets = this.counters.get(channel);
    if (!targets) {
      targets = new Map();
      this.counters.set(channel, targets);
    }
    let counter = targets.get(target);
    if (!counter) {
      counter = { attempts: 0, successes: 0 };
      targets.set(target, counter);
    }
    return counter;
  }
}
