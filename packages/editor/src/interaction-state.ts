/**
 * @module interaction-state
 * Pointer interaction modes for the mask painter.
 *
 * Drawing and panning are mutually exclusive. A pan ends only when the
 * button that started it is released.
 */

import type { InteractionMode, PointerButton } from '@maskpaint/types';

/** What a press or release did, if anything. */
export type InteractionTransition = 'stroke-start' | 'stroke-end' | 'pan-start' | 'pan-end';

/**
 * Three-state machine: idle, drawing, panning.
 *
 * ```
 * idle --primary down--> drawing --primary up--> idle
 * idle --middle/secondary down--> panning --same button up--> idle
 * ```
 *
 * Every other input leaves the state unchanged and returns null.
 */
export class InteractionStateMachine {
  private _mode: InteractionMode = 'idle';
  private _panButton: PointerButton | null = null;

  get mode(): InteractionMode {
    return this._mode;
  }

  /** Button holding the current pan, or null when not panning. */
  get panButton(): PointerButton | null {
    return this._panButton;
  }

  press(button: PointerButton): InteractionTransition | null {
    if (this._mode !== 'idle') return null;
    if (button === 'primary') {
      this._mode = 'drawing';
      return 'stroke-start';
    }
    this._mode = 'panning';
    this._panButton = button;
    return 'pan-start';
  }

  release(button: PointerButton): InteractionTransition | null {
    if (this._mode === 'drawing' && button === 'primary') {
      this._mode = 'idle';
      return 'stroke-end';
    }
    if (this._mode === 'panning' && button === this._panButton) {
      this._mode = 'idle';
      this._panButton = null;
      return 'pan-end';
    }
    return null;
  }

  /** Leave whatever mode is active as if its button had been released. */
  cancel(): InteractionTransition | null {
    if (this._mode === 'drawing') return this.release('primary');
    if (this._panButton) return this.release(this._panButton);
    return null;
  }
}
