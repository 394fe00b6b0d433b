import { describe, expect, it } from '@jest/globals';
import { RollingWindow } from '@/lib/core/signal/rolling-window';

const entry = (t: number, x = 0) => ({
  t,
  gaze: { x, y: 0 },
  targets: { a: { x: x + 1, y: 1 }, b: { x: x + 2, y: 2 } },
  submit: { x: x + 3, y: 3 },
});

describe('RollingWindow', () => {
  it('prunes entries older than the window', () => {
    const window = new RollingWindow(1000, ['a', 'b']);
    for (const t of [0, 0.5, 1, 1.5]) window.push(entry(t));

    expect(window.timestamps).toEqual([0.5, 1, 1.5]);
    expect(window.length).toBe(3);
    expect(new Set(window.seriesLengths())).toEqual(new Set([3]));
  });

  it('rejects samples older than the newest one', () => {
    const window = new RollingWindow(1000, ['a', 'b']);
    window.push(entry(1.5));

    expect(window.push(entry(1.2))).toBe(false);
    expect(window.push(entry(1.5))).toBe(true);
    expect(window.length).toBe(2);
  });

  it('keeps every trace aligned with the timestamps', () => {
    const window = new RollingWindow(5000, ['a', 'b']);
    window.push(entry(0, 10));
    window.push(entry(0.1, 20));

    expect(window.gazeTrace().x).toEqual([10, 20]);
    expect(window.targetTrace('a')?.x).toEqual([11, 21]);
    expect(window.targetTrace('b')?.y).toEqual([2, 2]);
    expect(window.submitTrace().x).toEqual([13, 23]);
    expect(window.targetTrace('missing')).toBeUndefined();
  });

  it('repeats the last position of a target missing from an entry', () => {
    const window = new RollingWindow(5000, ['a', 'b']);
    window.push({ t: 0, gaze: { x: 7, y: 8 }, targets: { a: { x: 1, y: 1 } }, submit: { x: 0, y: 0 } });
    window.push(entry(0.1, 20));
    window.push({ t: 0.2, gaze: { x: 0, y: 0 }, targets: { a: { x: 5, y: 5 } }, submit: { x: 0, y: 0 } });

    // First entry had no 'b' yet, so it falls back to the gaze point
    expect(window.targetTrace('b')?.x).toEqual([7, 22, 22]);
    expect(window.targetTrace('b')?.y).toEqual([8, 2, 2]);
  });

  it('empties every series on clear', () => {
    const window = new RollingWindow(1000, ['a', 'b']);
    window.push(entry(0));
    window.clear();

    expect(window.length).toBe(0);
    expect(window.newest).toBeNull();
    expect(window.seriesLengths().every(n => n === 0)).toBe(true);
  });
});
