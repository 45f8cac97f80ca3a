import { describe, it, expect } from 'vitest';
import { InteractionStateMachine } from './interaction-state';

describe('InteractionStateMachine', () => {
  it('starts idle', () => {
    const sm = new InteractionStateMachine();
    expect(sm.mode).toBe('idle');
    expect(sm.panButton).toBeNull();
  });

  it('draws between primary down and up', () => {
    const sm = new InteractionStateMachine();
    expect(sm.press('primary')).toBe('stroke-start');
    expect(sm.mode).toBe('drawing');
    expect(sm.release('primary')).toBe('stroke-end');
    expect(sm.mode).toBe('idle');
  });

  it.each(['middle', 'secondary'] as const)('pans with the %s button', (button) => {
    const sm = new InteractionStateMachine();
    expect(sm.press(button)).toBe('pan-start');
    expect(sm.mode).toBe('panning');
    expect(sm.panButton).toBe(button);
    expect(sm.release(button)).toBe('pan-end');
    expect(sm.mode).toBe('idle');
  });

  it('ignores pan buttons while drawing', () => {
    const sm = new InteractionStateMachine();
    sm.press('primary');
    expect(sm.press('middle')).toBeNull();
    expect(sm.press('secondary')).toBeNull();
    expect(sm.mode).toBe('drawing');
  });

  it('ignores primary while panning', () => {
    const sm = new InteractionStateMachine();
    sm.press('secondary');
    expect(sm.press('primary')).toBeNull();
    expect(sm.release('primary')).toBeNull();
    expect(sm.mode).toBe('panning');
  });

  it('ends a pan only on release of the button that started it', () => {
    const sm = new InteractionStateMachine();
    sm.press('middle');
    expect(sm.release('secondary')).toBeNull();
    expect(sm.mode).toBe('panning');
    expect(sm.release('middle')).toBe('pan-end');
  });

  it('ignores releases while idle', () => {
    const sm = new InteractionStateMachine();
    expect(sm.release('primary')).toBeNull();
    expect(sm.release('middle')).toBeNull();
  });

  describe('cancel', () => {
    it('ends a stroke', () => {
      const sm = new InteractionStateMachine();
      sm.press('primary');
      expect(sm.cancel()).toBe('stroke-end');
      expect(sm.mode).toBe('idle');
    });

    it('ends a pan', () => {
      const sm = new InteractionStateMachine();
      sm.press('secondary');
      expect(sm.cancel()).toBe('pan-end');
      expect(sm.panButton).toBeNull();
    });

    it('does nothing while idle', () => {
      expect(new InteractionStateMachine().cancel()).toBeNull();
    });
  });
});
