/**
 * MenuTheme
 *
 * Ambient theme for menu items. Items read it through `useMenuTheme()` and
 * merge it with their own `itemTheme` override and the static defaults.
 *
 * @example
 * ```tsx
 * <MenuThemeProvider brightness="dark" theme={{ itemTheme: { destructiveColor: '#E5484D' } }}>
 *   <Menu>...</Menu>
 * </MenuThemeProvider>
 * ```
 */
import { createContext, useContext, useMemo, type ReactNode } from 'react';
import type { LucideIcon } from 'lucide-react';
import { getDefaultItemTheme } from './menuDefaults';

// ============================================
// Types
// ============================================
export type MenuBrightness = 'light' | 'dark';

export interface MenuTextStyle {
  color: string;
  fontSize: number;
  lineHeight: number;
  fontWeight: number;
  letterSpacing: number;
}

export interface MenuItemTheme {
  /** Title style of full-width items */
  textStyle: MenuTextStyle;
  /** Title style of compact and standard items (inside an actions row) */
  iconActionTextStyle: MenuTextStyle;
  /** Title and icon style while hovered */
  onHoverTextStyle: MenuTextStyle;
  /** Background while hovered */
  onHoverColor: string;
  /** Background while pressed */
  pressedColor: string;
  destructiveColor: string;
  /** Alpha multiplier applied to text and icon colors of disabled items */
  disabledOpacity: number;
  iconSize: number;
  checkmark: LucideIcon;
  /** Stroke width of the checkmark glyph */
  checkmarkWeight: number;
  checkmarkSize: number;
}

type TextStyleKey = 'textStyle' | 'iconActionTextStyle' | 'onHoverTextStyle';

/**
 * Partial item theme. Text styles are partial as well and merge field by field.
 */
export type MenuItemThemeOverride = {
  [K in keyof MenuItemTheme]?: K extends TextStyleKey ? Partial<MenuTextStyle> : MenuItemTheme[K];
};

export interface MenuTheme {
  itemTheme?: MenuItemThemeOverride;
}

export interface MenuThemeContextValue {
  /** Theme supplied by the nearest provider, null when there is none */
  ambient: MenuItemThemeOverride | null;
  defaults: MenuItemTheme;
}

// ============================================
// Context
// ============================================
const MenuThemeContext = createContext<MenuThemeContextValue | null>(null);

export interface MenuThemeProviderProps {
  children: ReactNode;
  theme?: MenuTheme;
  brightness?: MenuBrightness;
}

export function MenuThemeProvider({ children, theme, brightness = 'light' }: MenuThemeProviderProps) {
  const itemTheme = theme?.itemTheme ?? null;
  const value = useMemo<MenuThemeContextValue>(
    () => ({ ambient: itemTheme, defaults: getDefaultItemTheme(brightness) }),
    [itemTheme, brightness]
  );

  return <MenuThemeContext.Provider value={value}>{children}</MenuThemeContext.Provider>;
}

const fallbackTheme: MenuThemeContextValue = {
  ambient: null,
  defaults: getDefaultItemTheme('light'),
};

/**
 * Returns the ambient theme and defaults. Outside a provider the light
 * defaults are used and there is no ambient layer.
 */
export function useMenuTheme(): MenuThemeContextValue {
  return useContext(MenuThemeContext) ?? fallbackTheme;
}
