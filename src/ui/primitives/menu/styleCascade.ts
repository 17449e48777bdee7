/**
 * Style cascade for menu items.
 *
 * Three layers are merged field by field: the item's own override, the
 * ambient theme and the static defaults. The first layer that defines a field
 * wins. The result is frozen and owned by a single render of a single item.
 */
import Color from 'color';
import type { LucideIcon } from 'lucide-react';
import type { MenuItemTheme, MenuItemThemeOverride, MenuTextStyle } from './MenuTheme';
import type { InteractionState } from './interaction';
import type { ElementSize } from './MenuEnvironment';

// ============================================
// Types
// ============================================
export interface ResolvedItemStyle {
  readonly textStyle: Readonly<MenuTextStyle>;
  readonly iconActionTextStyle: Readonly<MenuTextStyle>;
  readonly onHoverTextStyle: Readonly<MenuTextStyle>;
  readonly onHoverColor: string;
  readonly pressedColor: string;
  readonly destructiveColor: string;
  readonly iconSize: number;
  /** Explicit icon tint. Null for destructive items and items without one. */
  readonly iconColor: string | null;
  readonly checkmark: LucideIcon;
  readonly checkmarkWeight: number;
  readonly checkmarkSize: number;
}

export interface ResolveItemStyleOptions {
  override?: MenuItemThemeOverride | null;
  ambient?: MenuItemThemeOverride | null;
  defaults: MenuItemTheme;
  enabled: boolean;
  isDestructive: boolean;
  iconColor?: string | null;
}

export interface InteractionStyle {
  textStyle: Readonly<MenuTextStyle>;
  iconColor: string;
  backgroundColor: string | undefined;
}

// ============================================
// Merging
// ============================================
function pick<T>(override: T | undefined, ambient: T | undefined, fallback: T): T {
  if (override !== undefined) return override;
  if (ambient !== undefined) return ambient;
  return fallback;
}

function mergeTextStyle(
  override: Partial<MenuTextStyle> | undefined,
  ambient: Partial<MenuTextStyle> | undefined,
  defaults: MenuTextStyle
): MenuTextStyle {
  return {
    color: pick(override?.color, ambient?.color, defaults.color),
    fontSize: pick(override?.fontSize, ambient?.fontSize, defaults.fontSize),
    lineHeight: pick(override?.lineHeight, ambient?.lineHeight, defaults.lineHeight),
    fontWeight: pick(override?.fontWeight, ambient?.fontWeight, defaults.fontWeight),
    letterSpacing: pick(override?.letterSpacing, ambient?.letterSpacing, defaults.letterSpacing),
  };
}

function parseColor(color: string): ReturnType<typeof Color> | null {
  try {
    return Color(color);
  } catch {
    return null;
  }
}

/**
 * Normalises a CSS color to rgb()/rgba() notation, scaling its alpha.
 *
 * Colors the `color` package cannot read (`var(--x)`, `currentColor`,
 * `oklch(...)`) pass through unchanged, or are dimmed with `color-mix()`.
 */
export function fadeColor(color: string, opacity = 1): string {
  const parsed = parseColor(color);
  if (parsed) {
    return parsed.alpha(parsed.alpha() * opacity).rgb().string();
  }
  if (opacity === 1) {
    return color;
  }
  return `color-mix(in srgb, ${color} ${Math.round(opacity * 1000) / 10}%, transparent)`;
}

function withColor(style: MenuTextStyle, color: string): Readonly<MenuTextStyle> {
  return Object.freeze({ ...style, color });
}

// ============================================
// Resolution
// ============================================
export function resolveItemStyle({
  override,
  ambient,
  defaults,
  enabled,
  isDestructive,
  iconColor,
}: ResolveItemStyleOptions): ResolvedItemStyle {
  const top = override ?? undefined;
  const middle = ambient ?? undefined;

  const destructiveColor = pick(top?.destructiveColor, middle?.destructiveColor, defaults.destructiveColor);
  const disabledOpacity = pick(top?.disabledOpacity, middle?.disabledOpacity, defaults.disabledOpacity);
  const opacity = enabled ? 1 : disabledOpacity;

  const textStyle = mergeTextStyle(top?.textStyle, middle?.textStyle, defaults.textStyle);
  const iconActionTextStyle = mergeTextStyle(
    top?.iconActionTextStyle,
    middle?.iconActionTextStyle,
    defaults.iconActionTextStyle
  );
  const onHoverTextStyle = mergeTextStyle(
    top?.onHoverTextStyle,
    middle?.onHoverTextStyle,
    defaults.onHoverTextStyle
  );

  const tint = (color: string) => fadeColor(isDestructive ? destructiveColor : color, opacity);

  return Object.freeze({
    textStyle: withColor(textStyle, tint(textStyle.color)),
    iconActionTextStyle: withColor(iconActionTextStyle, tint(iconActionTextStyle.color)),
    onHoverTextStyle: withColor(onHoverTextStyle, fadeColor(onHoverTextStyle.color)),
    onHoverColor: fadeColor(pick(top?.onHoverColor, middle?.onHoverColor, defaults.onHoverColor)),
    pressedColor: fadeColor(pick(top?.pressedColor, middle?.pressedColor, defaults.pressedColor)),
    destructiveColor: fadeColor(destructiveColor),
    iconSize: pick(top?.iconSize, middle?.iconSize, defaults.iconSize),
    iconColor: !isDestructive && iconColor ? fadeColor(iconColor, opacity) : null,
    checkmark: pick(top?.checkmark, middle?.checkmark, defaults.checkmark),
    checkmarkWeight: pick(top?.checkmarkWeight, middle?.checkmarkWeight, defaults.checkmarkWeight),
    checkmarkSize: pick(top?.checkmarkSize, middle?.checkmarkSize, defaults.checkmarkSize),
  });
}

/**
 * Picks the text style, icon tint and background for one interaction state.
 */
export function selectInteractionStyle(
  style: ResolvedItemStyle,
  size: ElementSize,
  state: InteractionState
): InteractionStyle {
  const baseText = size === 'full' ? style.textStyle : style.iconActionTextStyle;

  if (state === 'hovered') {
    // Action row items keep their smaller title metrics on hover.
    const textStyle =
      size === 'full'
        ? style.onHoverTextStyle
        : { ...style.onHoverTextStyle, fontSize: baseText.fontSize, lineHeight: baseText.lineHeight };
    return {
      textStyle,
      iconColor: style.onHoverTextStyle.color,
      backgroundColor: style.onHoverColor,
    };
  }

  return {
    textStyle: baseText,
    iconColor: style.iconColor ?? baseText.color,
    backgroundColor: state === 'pressed' ? style.pressedColor : undefined,
  };
}
