import { describe, expect, it } from 'vitest';
import { transitionInteraction, type InteractionEvent, type InteractionState } from '../interaction';

function run(events: InteractionEvent[], enabled = true): InteractionState {
  return events.reduce<InteractionState>(
    (state, event) => transitionInteraction(state, event, enabled),
    'idle'
  );
}

describe('transitionInteraction', () => {
  it('hovers on enter and returns to idle on leave', () => {
    expect(run(['enter'])).toBe('hovered');
    expect(run(['enter', 'leave'])).toBe('idle');
  });

  it('presses while hovered and releases back to hovered', () => {
    expect(run(['enter', 'down'])).toBe('pressed');
    expect(run(['enter', 'down', 'up'])).toBe('hovered');
  });

  it('drops the press when the pointer leaves', () => {
    expect(run(['enter', 'down', 'leave'])).toBe('idle');
  });

  it('presses without hovering first for touch input', () => {
    expect(run(['down'])).toBe('pressed');
  });

  it('treats a cancelled press like a release', () => {
    expect(run(['enter', 'down', 'cancel'])).toBe('hovered');
  });

  it('ignores releases that were never pressed', () => {
    expect(run(['up'])).toBe('idle');
    expect(run(['enter', 'up'])).toBe('hovered');
  });

  it('keeps a pressed item pressed when entered again', () => {
    expect(transitionInteraction('pressed', 'enter', true)).toBe('pressed');
  });

  it('never leaves idle when disabled', () => {
    expect(run(['enter'], false)).toBe('idle');
    expect(run(['enter', 'down'], false)).toBe('idle');
    expect(transitionInteraction('hovered', 'down', false)).toBe('idle');
  });
});
