/**
 * MenuItemLayout
 *
 * Builds the visual structure of a menu item for its size classification:
 * - compact: icon only
 * - standard: icon above a one-line title
 * - full: optional selection indicator, title, optional trailing icon
 */
import type { CSSProperties, ReactNode } from 'react';
import type { LucideIcon } from 'lucide-react';
import { MIN_ITEM_HEIGHT } from './constants';
import { assertMenuContract } from './debug';
import { isLargeTextScale, type ElementSize } from './MenuEnvironment';
import type { MenuTextStyle } from './MenuTheme';
import { SelectionIndicator, type SelectionIndicatorProps } from './SelectionIndicator';
import styles from './Menu.module.css';

// ============================================
// Icon content
// ============================================
export type IconContent =
  | { kind: 'glyph'; glyph: LucideIcon }
  | { kind: 'custom'; content: ReactNode };

/**
 * Normalises the two icon props into one tagged value.
 */
export function resolveIconContent(
  icon: LucideIcon | undefined,
  customIcon: ReactNode | undefined
): IconContent | null {
  const hasCustom = customIcon !== undefined && customIcon !== null;
  assertMenuContract(!(icon && hasCustom), 'Please provide either icon or customIcon');

  if (icon) return { kind: 'glyph', glyph: icon };
  if (hasCustom) return { kind: 'custom', content: customIcon };
  return null;
}

export function assertIconForSize(size: ElementSize, icon: IconContent | null): void {
  assertMenuContract(
    size === 'full' || icon !== null,
    `Either icon or customIcon should be provided for ${size} menu items`
  );
}

// ============================================
// Metrics
// ============================================

/** Gap between the selection indicator and the title */
export function leadingIndicatorGap(textScale: number): number {
  return 3 * textScale * (isLargeTextScale(textScale) ? 2 : 1);
}

export function resolveFullMinHeight(textScale: number): number {
  return Math.round(MIN_ITEM_HEIGHT * Math.max(1, textScale));
}

/**
 * Splits a title into the lines it renders as. Soft wrapping is off, so only
 * explicit line breaks start a new line; the last kept line is ellipsized
 * when lines are dropped.
 */
export function clampTitleLines(title: string, maxLines: number): string[] {
  const lines = title.split('\n');
  if (lines.length <= maxLines) return lines;

  const kept = lines.slice(0, maxLines);
  kept[maxLines - 1] = `${kept[maxLines - 1]}…`;
  return kept;
}

function toTextCss(textStyle: MenuTextStyle): CSSProperties {
  return {
    color: textStyle.color,
    fontSize: textStyle.fontSize,
    lineHeight: `${textStyle.lineHeight}px`,
    fontWeight: textStyle.fontWeight,
    letterSpacing: textStyle.letterSpacing,
  };
}

// ============================================
// Parts
// ============================================
interface ItemIconProps {
  content: IconContent;
  color: string;
  size: number;
}

function ItemIcon({ content, color, size }: ItemIconProps) {
  let glyph: ReactNode;
  if (content.kind === 'glyph') {
    const Glyph = content.glyph;
    glyph = <Glyph size={size} color={color} />;
  } else {
    glyph = content.content;
  }

  return (
    <span
      className={styles.itemIcon}
      data-part="icon"
      style={{ color, fontSize: size }}
      aria-hidden="true"
    >
      {glyph}
    </span>
  );
}

interface ItemTitleProps {
  title: string;
  maxLines: number;
  textStyle: MenuTextStyle;
}

function ItemTitle({ title, maxLines, textStyle }: ItemTitleProps) {
  const lines = clampTitleLines(title, maxLines);

  return (
    <span
      className={styles.itemTitle}
      data-part="title"
      data-max-lines={maxLines}
      style={toTextCss(textStyle)}
    >
      {lines.map((line, index) => (
        <span key={index} className={styles.itemTitleLine}>
          {line}
        </span>
      ))}
    </span>
  );
}

// ============================================
// MenuItemLayout
// ============================================
export interface MenuItemLayoutProps {
  size: ElementSize;
  title: string;
  icon: IconContent | null;
  textStyle: MenuTextStyle;
  iconColor: string;
  /** Icon size before text scaling */
  iconSize: number;
  /** Selection indicator to show; only full items render it */
  selection: SelectionIndicatorProps | null;
  textScale: number;
}

export function MenuItemLayout({
  size,
  title,
  icon,
  textStyle,
  iconColor,
  iconSize,
  selection,
  textScale,
}: MenuItemLayoutProps) {
  assertIconForSize(size, icon);

  const scaledIconSize = iconSize * textScale;

  switch (size) {
    case 'compact':
      return (
        <div className={styles.actionItem} data-size="compact">
          {icon && <ItemIcon content={icon} color={iconColor} size={scaledIconSize} />}
        </div>
      );
    case 'standard':
      return (
        <div className={styles.actionItem} data-size="standard">
          {icon && <ItemIcon content={icon} color={iconColor} size={scaledIconSize} />}
          <ItemTitle title={title} maxLines={1} textStyle={textStyle} />
        </div>
      );
    case 'full': {
      const largeText = isLargeTextScale(textScale);

      return (
        <div
          className={styles.fullItem}
          data-size="full"
          data-selectable={selection !== null}
          style={{ minHeight: resolveFullMinHeight(textScale) }}
        >
          {selection && (
            <span
              className={styles.leadingSlot}
              style={{ paddingInlineEnd: leadingIndicatorGap(textScale) }}
            >
              <SelectionIndicator {...selection} />
            </span>
          )}
          <ItemTitle title={title} maxLines={largeText ? 3 : 2} textStyle={textStyle} />
          {/* Large text gives the title the icon's space. */}
          {!largeText && icon && (
            <span className={styles.trailingSlot}>
              <ItemIcon content={icon} color={iconColor} size={scaledIconSize} />
            </span>
          )}
        </div>
      );
    }
  }
}
