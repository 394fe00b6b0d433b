import { describe, expect, it } from '@jest/globals';
import type { AreaId } from '@/types/engine';
import { BlinkEngine } from '@/lib/engines/blink-engine';
import { normalizeEngineConfig } from '@/lib/engines/engine-config';
import { createHitTest } from '@/lib/layout/hit-testing';
import { optionArea, REST_AREA, SUBMIT_AREA } from '@/lib/layout/areas';

const hitTest = createHitTest([
  { area: optionArea('yes'), rect: { x: 0, y: 0, width: 100, height: 100 } },
  { area: SUBMIT_AREA, rect: { x: 0, y: 100, width: 100, height: 100 } },
  { area: REST_AREA, rect: { x: 100, y: 0, width: 100, height: 200 } },
]);

function setup() {
  const calls: Array<[AreaId, number]> = [];
  const engine = new BlinkEngine({
    config: normalizeEngineConfig(),
    hitTest,
    onActivate: (area, atSec) => {
      calls.push([area, atSec]);
      return true;
    },
  });
  const blink = (t: number, blinking: boolean) => engine.handleBlink({ t, blinking });
  return { engine, calls, blink };
}

describe('BlinkEngine', () => {
  it('activates the area under gaze once the blink is held long enough', () => {
    const { engine, calls, blink } = setup();
    engine.handleGaze({ t: 0, x: 50, y: 50 });
    blink(1, true);
    blink(1.4, true);
    expect(calls).toHaveLength(0);

    blink(1.5, true);
    expect(calls).toEqual([[optionArea('yes'), 1.5]]);
    expect(engine.getFeedback()).toEqual({ mode: 'blink', isBlinking: true, fired: true });
  });

  it('fires once per blink', () => {
    const { engine, calls, blink } = setup();
    engine.handleGaze({ t: 0, x: 50, y: 150 });
    blink(1, true);
    blink(1.5, true);
    blink(1.8, true);
    blink(2, false);
    expect(calls).toEqual([[SUBMIT_AREA, 1.5]]);

    blink(2.2, true);
    blink(2.8, true);
    expect(calls).toHaveLength(2);
  });

  it('ignores short blinks', () => {
    const { engine, calls, blink } = setup();
    engine.handleGaze({ t: 0, x: 50, y: 50 });
    blink(1, true);
    blink(1.3, false);
    blink(1.6, false);

    expect(calls).toHaveLength(0);
    expect(engine.getFeedback().isBlinking).toBe(false);
  });

  it('does nothing without gaze or over the rest zone', () => {
    const { engine, calls, blink } = setup();
    blink(0, true);
    blink(1, true);

    engine.handleGaze({ t: 2, x: 150, y: 50 });
    blink(3, false);
    blink(3.1, true);
    blink(4, true);

    engine.handleGaze({ t: 5, x: 50, y: 50 });
    engine.handleGazeLost(5.1);
    blink(5.5, false);
    blink(6, true);
    blink(7, true);

    expect(calls).toHaveLength(0);
  });

  it('starts fresh after reset', () => {
    const { engine, calls, blink } = setup();
    engine.handleGaze({ t: 0, x: 50, y: 50 });
    blink(1, true);
    engine.reset();
    blink(1.5, true);

    expect(calls).toHaveLength(0);
    expect(engine.getFeedback().isBlinking).toBe(true);
  });
});
