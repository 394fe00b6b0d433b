import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { MotionShape } from '@/types/motion';
import { QuestionKind } from '@/types/question';
import { buildPursuitLayout, resolveLabels } from '@/lib/core/motion/presets';

const FULL_HD = { width: 1920, height: 1080 };
const FREQUENCIES = { optionFrequencyHz: 0.25, submitFrequencyHz: 0.28 };

describe('resolveLabels', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uses the kind defaults when no labels are given', () => {
    expect(resolveLabels(QuestionKind.YesNo)).toEqual(['yes', 'no']);
    expect(resolveLabels(QuestionKind.Likert)).toEqual(['1', '2', '3', '4', '5']);
  });

  it('keeps custom labels of the right length', () => {
    expect(resolveLabels(QuestionKind.YesNo, ['oui', 'non'])).toEqual(['oui', 'non']);
  });

  it('falls back to the defaults for a wrong count or duplicates', () => {
    expect(resolveLabels(QuestionKind.YesNo, ['only'])).toEqual(['yes', 'no']);
    expect(resolveLabels(QuestionKind.MultipleChoice, ['A', 'A', 'B', 'C'])).toEqual(['A', 'B', 'C', 'D']);
    expect(console.error).toHaveBeenCalledTimes(2);
  });
});

describe('buildPursuitLayout', () => {
  it('places yes/no rectangles on either side with opposite directions', () => {
    const layout = buildPursuitLayout(QuestionKind.YesNo, undefined, FULL_HD, FREQUENCIES);
    const [yes, no] = layout.targets;

    expect(yes.label).toBe('yes');
    expect(no.label).toBe('no');
    expect(yes.motion.shape).toBe(MotionShape.Rectangle);
    expect(yes.motion.center.x).toBe(311);
    expect(yes.motion.center.y).toBeCloseTo(583.2, 6);
    expect(no.motion.center.x).toBe(1609);
    expect(yes.motion.clockwise).toBe(false);
    expect(no.motion.clockwise).toBe(true);
    expect(yes.motion.frequencyHz).toBe(0.25);
  });

  it('moves the yes/no submit target along the submit row', () => {
    const { submit } = buildPursuitLayout(QuestionKind.YesNo, undefined, FULL_HD, FREQUENCIES);

    expect(submit.shape).toBe(MotionShape.Oscillation);
    expect(submit.center).toEqual({ x: 960, y: 949 });
    expect(submit.frequencyHz).toBe(0.28);
    if (submit.shape === MotionShape.Oscillation) {
      expect(submit.amplitudeX).toBeCloseTo(576, 9);
      expect(submit.amplitudeY).toBe(0);
    }
  });

  it('uses circles on top and squares below for multiple choice', () => {
    const layout = buildPursuitLayout(QuestionKind.MultipleChoice, ['A', 'B', 'C', 'D'], FULL_HD, FREQUENCIES);

    expect(layout.targets.map(t => t.motion.shape)).toEqual([
      MotionShape.Circle,
      MotionShape.Circle,
      MotionShape.Square,
      MotionShape.Square,
    ]);
    expect(layout.targets.map(t => t.motion.clockwise)).toEqual([true, false, true, false]);
    expect(layout.targets[0].motion.center.y).toBe(311);
    expect(layout.targets[2].motion.center.y).toBeCloseTo(712.8, 6);
    expect(layout.submit.center.y).toBe(949);
  });

  it('lays out five likert orbits with the submit row lowered', () => {
    const layout = buildPursuitLayout(QuestionKind.Likert, undefined, FULL_HD, FREQUENCIES);

    expect(layout.targets.map(t => t.label)).toEqual(['1', '2', '3', '4', '5']);
    expect(layout.targets[2].motion.shape).toBe(MotionShape.Triangle);
    expect(layout.targets[2].motion.center.x).toBe(960);
    expect(layout.submit.center.y).toBe(981);
  });

  it('uses the configured option frequency for every target', () => {
    const layout = buildPursuitLayout(QuestionKind.Likert, undefined, FULL_HD, {
      optionFrequencyHz: 0.4,
      submitFrequencyHz: 0.3,
    });
    expect(layout.targets.every(t => t.motion.frequencyHz === 0.4)).toBe(true);
    expect(layout.submit.frequencyHz).toBe(0.3);
  });
});
