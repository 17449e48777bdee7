/**
 * Pointer interaction state of a single menu item.
 *
 * idle → hovered (enter) → pressed (down) → hovered (up) → idle (leave)
 *
 * Touch pointers can press without hovering first. Disabled items never
 * leave `idle`.
 */
import { useCallback, useMemo, useReducer, type PointerEvent } from 'react';

export type InteractionState = 'idle' | 'hovered' | 'pressed';

export type InteractionEvent = 'enter' | 'leave' | 'down' | 'up' | 'cancel';

export function transitionInteraction(
  state: InteractionState,
  event: InteractionEvent,
  enabled: boolean
): InteractionState {
  if (!enabled) return 'idle';

  switch (event) {
    case 'enter':
      return state === 'idle' ? 'hovered' : state;
    case 'leave':
      return 'idle';
    case 'down':
      return 'pressed';
    case 'up':
    case 'cancel':
      return state === 'pressed' ? 'hovered' : state;
  }
}

export interface InteractionHandlers {
  onPointerEnter: (e: PointerEvent<HTMLElement>) => void;
  onPointerLeave: (e: PointerEvent<HTMLElement>) => void;
  onPointerDown: (e: PointerEvent<HTMLElement>) => void;
  onPointerUp: (e: PointerEvent<HTMLElement>) => void;
  onPointerCancel: (e: PointerEvent<HTMLElement>) => void;
}

export interface UseMenuItemInteractionReturn {
  state: InteractionState;
  handlers: InteractionHandlers;
}

/**
 * Tracks hover and press for one mounted item. The state lives only as long
 * as the item is mounted.
 */
export function useMenuItemInteraction(enabled: boolean): UseMenuItemInteractionReturn {
  const [current, dispatch] = useReducer(
    (state: InteractionState, action: { event: InteractionEvent; enabled: boolean }) =>
      transitionInteraction(state, action.event, action.enabled),
    'idle'
  );

  const send = useCallback(
    (event: InteractionEvent) => dispatch({ event, enabled }),
    [enabled]
  );

  const handlers = useMemo<InteractionHandlers>(
    () => ({
      onPointerEnter: () => send('enter'),
      onPointerLeave: () => send('leave'),
      onPointerDown: () => send('down'),
      onPointerUp: () => send('up'),
      onPointerCancel: () => send('cancel'),
    }),
    [send]
  );

  return {
    // An item disabled while hovered drops its feedback immediately.
    state: enabled ? current : 'idle',
    handlers,
  };
}
