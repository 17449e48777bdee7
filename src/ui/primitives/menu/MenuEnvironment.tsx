/**
 * Layout signals supplied to menu items by their surroundings: the size
 * classification, the text-scale factor and whether the enclosing menu
 * shows selection indicators.
 */
import { createContext, useContext, type ReactNode } from 'react';
import { LARGE_TEXT_SCALE_THRESHOLD } from './constants';

// ============================================
// Size classification
// ============================================

/**
 * `compact` and `standard` items live in an actions row and need an icon;
 * `full` items take a whole row of the menu.
 */
export type ElementSize = 'compact' | 'standard' | 'full';

export const ElementSizeContext = createContext<ElementSize>('full');

export function useElementSize(): ElementSize {
  return useContext(ElementSizeContext);
}

// ============================================
// Text scale
// ============================================
const TextScaleContext = createContext(1);

export interface TextScaleProviderProps {
  children: ReactNode;
  /** Host text-scale factor, 1 being the default size */
  value: number;
}

export function TextScaleProvider({ children, value }: TextScaleProviderProps) {
  return <TextScaleContext.Provider value={value}>{children}</TextScaleContext.Provider>;
}

export function useTextScale(): number {
  return useContext(TextScaleContext);
}

export function isLargeTextScale(textScale: number): boolean {
  return textScale > LARGE_TEXT_SCALE_THRESHOLD;
}

// ============================================
// Menu config
// ============================================
export interface MenuConfig {
  /** Whether the enclosing menu reserves space for selection indicators */
  selectable: boolean;
}

export const MenuConfigContext = createContext<MenuConfig>({ selectable: false });

export function useMenuConfig(): MenuConfig {
  return useContext(MenuConfigContext);
}
