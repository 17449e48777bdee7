/**
 * Menu Primitives
 *
 * Containers for menu items. `Menu` is the menu body, `MenuActionsRow` lays
 * out a row of icon items. Positioning and presentation belong to the host.
 */
import {
  forwardRef,
  useCallback,
  useMemo,
  type CSSProperties,
  type KeyboardEvent,
  type ReactNode,
} from 'react';
import { ElementSizeContext, MenuConfigContext, type MenuConfig } from './MenuEnvironment';
import { useMenuRoute } from './MenuRoute';
import styles from './Menu.module.css';

// ============================================================================
// Menu (Root container)
// ============================================================================

export interface MenuProps {
  children: ReactNode;
  /** Reserve space for selection indicators in every full item */
  selectable?: boolean;
  className?: string;
  style?: CSSProperties;
}

export const Menu = forwardRef<HTMLDivElement, MenuProps>(function Menu(
  { children, selectable = false, className, style },
  ref
) {
  const route = useMenuRoute();
  const config = useMemo<MenuConfig>(() => ({ selectable }), [selectable]);

  const handleKeyDown = useCallback(
    (e: KeyboardEvent<HTMLDivElement>) => {
      if (e.key === 'Escape' && route) {
        e.preventDefault();
        route.close();
      }
    },
    [route]
  );

  return (
    <MenuConfigContext.Provider value={config}>
      <div
        ref={ref}
        className={`${styles.menu} ${className || ''}`}
        style={style}
        tabIndex={-1}
        onKeyDown={handleKeyDown}
        role="menu"
      >
        {children}
      </div>
    </MenuConfigContext.Provider>
  );
});

// ============================================================================
// MenuActionsRow
// ============================================================================

export type MenuActionsRowSize = 'compact' | 'standard';

export interface MenuActionsRowProps {
  children: ReactNode;
  /** compact: icon only (up to four items), standard: icon and title (up to three) */
  size?: MenuActionsRowSize;
  className?: string;
}

export function MenuActionsRow({ children, size = 'standard', className }: MenuActionsRowProps) {
  return (
    <div className={`${styles.actionsRow} ${className || ''}`} data-size={size} role="group">
      <ElementSizeContext.Provider value={size}>{children}</ElementSizeContext.Provider>
    </div>
  );
}
