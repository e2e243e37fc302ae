/**
 * @file clock.ts
 * @description Fixed-rate frame pacing.
 *
 * wait() sleeps until the next tick deadline, one frame interval after the
 * previous one.  Deadlines advance by whole intervals so small timer jitter
 * does not accumulate into drift.  If a tick overran its whole budget the
 * clock does not try to catch up with a burst of zero-length waits; the next
 * deadline is measured from now instead.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import type { FrameClock } from './types.js';

export type NowFn   = () => number;
export type SleepFn = (ms: number) => Promise<unknown>;

export class IntervalClock implements FrameClock
{
  private readonly intervalMs: number;
  private deadline: number | null = null;

  constructor(
    fps: number,
    private readonly now: NowFn = () => performance.now(),
    private readonly sleepFor: SleepFn = sleep,
  ) {
    this.intervalMs = 1000 / fps;
  }

  async wait(): Promise<void>
  {
    const current = this.now();

    /* First call: the tick that just ran started roughly now. */
    const next = (this.deadline ?? current) + this.intervalMs;

    if (next <= current)
    {
      this.deadline = current;
      /* Still yield so queued terminal input gets delivered. */
      await this.sleepFor(0);
      return;
    }

    this.deadline = next;
    await this.sleepFor(next - current);
  }
}
