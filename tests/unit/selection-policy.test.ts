import { describe, expect, it } from '@jest/globals';
import { EngineEventType } from '@/types/engine';
import { QuestionKind } from '@/types/question';
import { SelectionPolicy } from '@/lib/policy/selection-policy';
import { optionArea, REST_AREA, RESET_AREA, SUBMIT_AREA } from '@/lib/layout/areas';

const multipleChoice = (allowEmptySubmit = false) =>
  new SelectionPolicy({ kind: QuestionKind.MultipleChoice, labels: ['A', 'B', 'C', 'D'], allowEmptySubmit });

const yesNo = (allowEmptySubmit = false) =>
  new SelectionPolicy({ kind: QuestionKind.YesNo, labels: ['yes', 'no'], allowEmptySubmit });

describe('SelectionPolicy', () => {
  describe('multi-select', () => {
    it('toggles labels in and out of the selection', () => {
      const policy = multipleChoice();

      expect(policy.apply(optionArea('B'), 1)).toEqual({ type: EngineEventType.Toggle, label: 'B', selected: true });
      expect(policy.apply(optionArea('A'), 2)).toEqual({ type: EngineEventType.Toggle, label: 'A', selected: true });
      expect(policy.apply(optionArea('B'), 3)).toEqual({ type: EngineEventType.Toggle, label: 'B', selected: false });
      expect(policy.currentAnswer()).toEqual(['A']);
      expect(policy.toggles).toBe(3);
    });

    it('submits labels in presentation order', () => {
      const policy = multipleChoice();
      policy.apply(optionArea('C'), 1);
      policy.apply(optionArea('A'), 2);

      expect(policy.apply(SUBMIT_AREA, 3)).toEqual({ type: EngineEventType.Submit, answer: ['A', 'C'] });
      expect(policy.answer).toEqual(['A', 'C']);
      expect(policy.clicks).toEqual([
        { index: 1, atSec: 1, action: 'toggle:C' },
        { index: 2, atSec: 2, action: 'toggle:A' },
        { index: 3, atSec: 3, action: 'submit' },
      ]);
    });
  });

  describe('single-select', () => {
    it('replaces the selection and counts only changes', () => {
      const policy = yesNo();

      expect(policy.apply(optionArea('yes'), 1)).toEqual({ type: EngineEventType.Select, label: 'yes' });
      expect(policy.apply(optionArea('yes'), 2)).toEqual({ type: EngineEventType.Select, label: 'yes' });
      policy.apply(optionArea('no'), 3);

      expect(policy.currentAnswer()).toBe('no');
      expect(policy.toggles).toBe(2);
      expect(policy.clicks.map(c => c.action)).toEqual(['select:yes', 'select:yes', 'select:no']);
    });

    it('submits the single label', () => {
      const policy = yesNo();
      policy.apply(optionArea('no'), 1);
      expect(policy.apply(SUBMIT_AREA, 2)).toEqual({ type: EngineEventType.Submit, answer: 'no' });
    });
  });

  it('clears the selection on reset and refuses a reset with nothing selected', () => {
    const policy = multipleChoice();
    expect(policy.apply(RESET_AREA, 1)).toBeNull();

    policy.apply(optionArea('D'), 2);
    expect(policy.apply(RESET_AREA, 3)).toEqual({ type: EngineEventType.Reset });
    expect(policy.hasSelection).toBe(false);
    expect(policy.resets).toBe(1);
    expect(policy.clicks.map(c => c.action)).toEqual(['toggle:D', 'reset']);
  });

  it('refuses an empty submission unless allowed', () => {
    expect(yesNo().apply(SUBMIT_AREA, 1)).toBeNull();
    expect(yesNo(true).apply(SUBMIT_AREA, 1)).toEqual({ type: EngineEventType.Submit, answer: '' });
    expect(multipleChoice(true).apply(SUBMIT_AREA, 1)).toEqual({ type: EngineEventType.Submit, answer: [] });
  });

  it('ignores the rest zone and unknown labels', () => {
    const policy = yesNo();
    expect(policy.apply(REST_AREA, 1)).toBeNull();
    expect(policy.apply(optionArea('maybe'), 2)).toBeNull();
    expect(policy.clicks).toHaveLength(0);
  });

  it('refuses everything once submitted', () => {
    const policy = yesNo();
    policy.apply(optionArea('yes'), 1);
    policy.apply(SUBMIT_AREA, 2);

    expect(policy.apply(optionArea('no'), 3)).toBeNull();
    expect(policy.apply(RESET_AREA, 4)).toBeNull();
    expect(policy.apply(SUBMIT_AREA, 5)).toBeNull();
    expect(policy.answer).toBe('yes');
    expect(policy.clicks).toHaveLength(2);
  });
});
