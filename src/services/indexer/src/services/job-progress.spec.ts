import { describe, it, expect } from 'vitest';
import { JobProgress, estimateEtaSeconds, progressPercentage, recentErrors } from './job-progress';

function progress() {
  let clock = Date.parse('2026-04-01T12:00:00.000Z');
  const p = new JobProgress('test', () => new Date((clock += 1000)));
  return p;
}

describe('JobProgress', () => {
  it('starts idle and empty', () => {
    expect(progress().snapshot()).toEqual({
      phase: 'idle',
      total: 0,
      completed: 0,
      results: {},
      current: null,
      startedAt: null,
      finishedAt: null,
    });
  });

  it('resets on batch-start and applies events in order', () => {
    const p = progress();
    p.channel.emit('batch-start', { total: 0 });
    p.channel.emit('phase', { phase: 'finding_static' });
    p.channel.emit('total', { total: 2 });
    p.channel.emit('item-start', { key: 'a', label: 'Alpha' });
    p.channel.emit('result', { key: 'a', outcome: { success: true, error: null, duration: 1.5 } });
    p.channel.emit('advance', {});

    expect(p.snapshot()).toEqual({
      phase: 'finding_static',
      total: 2,
      completed: 1,
      results: { a: { success: true, error: null, duration: 1.5 } },
      current: { key: 'a', label: 'Alpha', startedAt: '2026-04-01T12:00:02.000Z' },
      startedAt: '2026-04-01T12:00:01.000Z',
      finishedAt: null,
    });
    expect(p.isActive()).toBe(true);
  });

  it('never lets completed pass total', () => {
    const p = progress();
    p.channel.emit('batch-start', { total: 1 });
    p.channel.emit('advance', {});
    p.channel.emit('advance', {});

    expect(p.snapshot()).toMatchObject({ total: 1, completed: 1 });
  });

  it('ignores a total that would shrink', () => {
    const p = progress();
    p.channel.emit('batch-start', { total: 3 });
    p.channel.emit('total', { total: 2 });

    expect(p.snapshot().total).toBe(3);
  });

  it('hands out copies that later events do not touch', () => {
    const p = progress();
    p.channel.emit('batch-start', { total: 2 });
    const before = p.snapshot();
    p.channel.emit('result', { key: 'x', outcome: { success: false, error: 'boom', duration: 0 } });
    before.results.y = { success: true, error: null, duration: 0 };

    expect(before.results).toEqual({ y: { success: true, error: null, duration: 0 } });
    expect(Object.keys(p.snapshot().results)).toEqual(['x']);
  });

  it('returns to idle on batch-end', () => {
    const p = progress();
    p.channel.emit('batch-start', { total: 0 });
    p.channel.emit('item-start', { key: 'a', label: 'Alpha' });
    p.channel.emit('batch-end', {});

    expect(p.snapshot()).toMatchObject({ phase: 'idle', current: null, finishedAt: '2026-04-01T12:00:03.000Z' });
    expect(p.isActive()).toBe(false);
  });
});

describe('progress summaries', () => {
  const ok = (duration: number) => ({ success: true, error: null, duration });
  const fail = (error: string) => ({ success: false, error, duration: 1 });

  it('computes the percentage to one decimal', () => {
    expect(progressPercentage({ total: 3, completed: 1 })).toBe(33.3);
    expect(progressPercentage({ total: 0, completed: 0 })).toBe(0);
  });

  it('estimates time left from successful items only', () => {
    const results = { a: ok(2), b: ok(4), c: fail('x') };

    expect(estimateEtaSeconds({ total: 5, completed: 3, results })).toBe(6);
    expect(estimateEtaSeconds({ total: 5, completed: 0, results: {} })).toBe(0);
  });

  it('keeps the five latest failures and shortens long text', () => {
    const results: Record<string, ReturnType<typeof fail> | ReturnType<typeof ok>> = {};
    for (let i = 1; i <= 6; i++) results[`item${i}`] = fail(`error ${i}`);
    results.long = fail('x'.repeat(120));
    results.fine = ok(1);

    const errors = recentErrors({ results });
    expect(errors.map((e) => e.key)).toEqual(['item3', 'item4', 'item5', 'item6', 'long']);
    expect(errors[4]?.error).toBe(`${'x'.repeat(100)}...`);
  });
});
