import { describe, expect, it } from 'vitest';

import { ProgressMilestones, ProgressThrottle, computePercent } from '../progress';

describe('computePercent', () => {
  it('floors and caps at 100', () => {
    expect(computePercent(1, 3)).toBe(33);
    expect(computePercent(150, 100)).toBe(100);
  });

  it('is null without a usable total', () => {
    expect(computePercent(10, null)).toBeNull();
    expect(computePercent(10, 0)).toBeNull();
  });
});

describe('ProgressThrottle', () => {
  function clock(start = 0) {
    let time = start;
    return {
      now: () => time,
      set: (value: number) => {
        time = value;
      },
    };
  }

  it('waits for the first window to elapse', () => {
    const c = clock();
    const throttle = new ProgressThrottle({ now: c.now, random: () => 0 });

    c.set(29_999);
    expect(throttle.check(10, 100)).toBeNull();

    c.set(30_000);
    expect(throttle.check(50, 100)).toEqual({ downloaded: 50, total: 100, percent: 50 });
  });

  it('jitters the window within [min, max]', () => {
    const c = clock();
    const throttle = new ProgressThrottle({ now: c.now, random: () => 0.999 });

    c.set(34_994);
    expect(throttle.check(10, 100)).toBeNull();
    c.set(34_995);
    expect(throttle.check(10, 100)).toEqual({ downloaded: 10, total: 100, percent: 10 });
  });

  it('suppresses an unchanged percentage and keeps the window open', () => {
    const c = clock();
    const throttle = new ProgressThrottle({ now: c.now, random: () => 0 });

    c.set(30_000);
    expect(throttle.check(50, 100)?.percent).toBe(50);

    c.set(60_000);
    expect(throttle.check(50, 100)).toBeNull();

    c.set(61_000);
    expect(throttle.check(60, 100)?.percent).toBe(60);
  });

  it('never reports the same percentage twice in a row', () => {
    const throttle = new ProgressThrottle({ minIntervalMs: 0, maxIntervalMs: 0, now: () => 0 });
    const total = 300;
    const reported: number[] = [];
    let downloaded = 0;

    for (const size of [1, 1, 98, 100, 100]) {
      downloaded += size;
      const update = throttle.check(downloaded, total);
      if (update?.percent != null) reported.push(update.percent);
    }

    expect(reported).toEqual([0, 33, 66, 100]);
  });

  it('reports bytes only when the total is unknown', () => {
    const throttle = new ProgressThrottle({ minIntervalMs: 0, maxIntervalMs: 0, now: () => 0 });
    expect(throttle.check(500, null)).toEqual({ downloaded: 500, total: null, percent: null });
    expect(throttle.check(900, null)).toEqual({ downloaded: 900, total: null, percent: null });
  });
});

describe('ProgressMilestones', () => {
  it('emits each 10% boundary once', () => {
    const milestones = new ProgressMilestones(10);
    expect(milestones.check(5)).toBeNull();
    expect(milestones.check(12)).toBe(10);
    expect(milestones.check(19)).toBeNull();
    expect(milestones.check(45)).toBe(40);
    expect(milestones.check(100)).toBe(100);
    expect(milestones.check(100)).toBeNull();
    expect(milestones.check(null)).toBeNull();
  });
});
