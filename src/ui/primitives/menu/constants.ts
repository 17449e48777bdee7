/** Duration of the menu's close animation. Delayed taps wait this long. */
export const MENU_CLOSE_DURATION_MS = 300;

/** Text-scale factors above this value use the large text layout. */
export const LARGE_TEXT_SCALE_THRESHOLD = 1.4;

/** Minimum height of a full-width item at a text scale of 1. */
export const MIN_ITEM_HEIGHT = 44;
