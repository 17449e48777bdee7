/**
 * MenuItem
 *
 * One actionable row of a pull-down menu. Resolves its style from the
 * cascade, picks a layout for the size classification it is placed in,
 * tracks hover/press feedback and dispatches its action through the tap
 * policy.
 *
 * @example
 * ```tsx
 * <MenuItem title="Share" icon={Share} onTap={handleShare} />
 * <MenuItem title="Delete" icon={Trash2} isDestructive tapPolicy="immediate" onTap={handleDelete} />
 * <MenuItem title="Grid" selected={view === 'grid'} onTap={() => setView('grid')} />
 * ```
 */
import { useMemo, type ReactNode } from 'react';
import type { LucideIcon } from 'lucide-react';
import { useMenuItemInteraction } from './interaction';
import { MenuItemLayout, resolveIconContent } from './MenuItemLayout';
import { useElementSize, useMenuConfig, useTextScale } from './MenuEnvironment';
import { useMenuRoute } from './MenuRoute';
import { useMenuTheme, type MenuItemThemeOverride } from './MenuTheme';
import { resolveItemStyle, selectInteractionStyle } from './styleCascade';
import { activateMenuItem, type MenuItemTapHandler, type TapPolicy } from './tapDispatch';
import styles from './Menu.module.css';

// ============================================
// Props
// ============================================
interface MenuItemBaseProps {
  title: string;
  /** Action of the item. Items without one still render but do nothing on tap. */
  onTap?: () => void;
  /** How the menu closes around `onTap`. Default: 'popThenInvoke' */
  tapPolicy?: TapPolicy | MenuItemTapHandler;
  /** Disabled items are dimmed and ignore pointer input. Default: true */
  enabled?: boolean;
  /** Uses the theme's destructive color for title and icon */
  isDestructive?: boolean;
  /** Icon tint; ignored for destructive items */
  iconColor?: string;
  /** Checkmark state. Leave unset for items that cannot be selected. */
  selected?: boolean | null;
  /** Top layer of the style cascade */
  itemTheme?: MenuItemThemeOverride;
  className?: string;
}

type MenuItemIconProps =
  | { icon?: LucideIcon; customIcon?: never }
  | { icon?: never; customIcon: ReactNode };

export type MenuItemProps = MenuItemBaseProps & MenuItemIconProps;

// ============================================
// MenuItem
// ============================================
export function MenuItem(props: MenuItemProps) {
  const {
    title,
    onTap,
    tapPolicy = 'popThenInvoke',
    enabled = true,
    isDestructive = false,
    iconColor,
    selected = null,
    itemTheme,
    className,
  } = props;

  const size = useElementSize();
  const textScale = useTextScale();
  const { selectable } = useMenuConfig();
  const route = useMenuRoute();
  const { ambient, defaults } = useMenuTheme();
  const { state, handlers } = useMenuItemInteraction(enabled);

  const icon = resolveIconContent(props.icon, props.customIcon);

  const style = useMemo(
    () =>
      resolveItemStyle({
        override: itemTheme,
        ambient,
        defaults,
        enabled,
        isDestructive,
        iconColor,
      }),
    [itemTheme, ambient, defaults, enabled, isDestructive, iconColor]
  );

  const active = selectInteractionStyle(style, size, state);

  const showSelection = size === 'full' && (selected !== null || selectable);

  const handleClick = () => {
    if (!enabled || !onTap) return;
    activateMenuItem(route, onTap, tapPolicy);
  };

  return (
    <button
      type="button"
      className={`${styles.menuItem} ${className || ''}`}
      role={selected === null ? 'menuitem' : 'menuitemcheckbox'}
      aria-checked={selected ?? undefined}
      aria-disabled={!enabled}
      aria-label={title}
      disabled={!enabled}
      data-interaction={state}
      data-destructive={isDestructive}
      style={{ backgroundColor: active.backgroundColor }}
      onClick={handleClick}
      {...handlers}
    >
      <MenuItemLayout
        size={size}
        title={title}
        icon={icon}
        textStyle={active.textStyle}
        iconColor={active.iconColor}
        iconSize={style.iconSize}
        selection={
          showSelection
            ? {
                selected: selected ?? false,
                glyph: style.checkmark,
                weight: style.checkmarkWeight,
                size: style.checkmarkSize,
                color: active.textStyle.color,
              }
            : null
        }
        textScale={textScale}
      />
    </button>
  );
}
