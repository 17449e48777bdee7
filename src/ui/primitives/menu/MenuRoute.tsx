/**
 * MenuRoute
 *
 * Handle to the overlay that presents a menu. Items use it to close the menu
 * and hand back the action the host should run once the menu is gone.
 *
 * @example
 * ```tsx
 * const [open, setOpen] = useState(false);
 *
 * const handleClose = useCallback((result?: MenuRouteResult) => {
 *   setOpen(false);
 *   runMenuRouteResult(result);
 * }, []);
 *
 * {open && (
 *   <MenuRouteProvider onClose={handleClose}>
 *     <Menu>...</Menu>
 *   </MenuRouteProvider>
 * )}
 * ```
 */
import { createContext, useContext, useMemo, type ReactNode } from 'react';
import { MENU_CLOSE_DURATION_MS } from './constants';

// ============================================
// Types
// ============================================

/** Action the host runs after the menu has closed */
export type MenuRouteResult = () => void | Promise<void>;

export interface MenuRouteHandle {
  close: (result?: MenuRouteResult) => void;
  /** Length of the close animation, used by delayed taps */
  closeDurationMs: number;
}

// ============================================
// Context
// ============================================
const MenuRouteContext = createContext<MenuRouteHandle | null>(null);

export interface MenuRouteProviderProps {
  children: ReactNode;
  onClose: (result?: MenuRouteResult) => void;
  closeDurationMs?: number;
}

export function MenuRouteProvider({
  children,
  onClose,
  closeDurationMs = MENU_CLOSE_DURATION_MS,
}: MenuRouteProviderProps) {
  const handle = useMemo<MenuRouteHandle>(
    () => ({ close: onClose, closeDurationMs }),
    [onClose, closeDurationMs]
  );

  return <MenuRouteContext.Provider value={handle}>{children}</MenuRouteContext.Provider>;
}

/**
 * Returns the enclosing route, or null when the menu is rendered inline.
 */
export function useMenuRoute(): MenuRouteHandle | null {
  return useContext(MenuRouteContext);
}

/**
 * Runs a route result on behalf of a host. Synchronous errors reach the
 * caller; rejections are logged since nothing awaits them once the menu is gone.
 */
export function runMenuRouteResult(result?: MenuRouteResult): void {
  if (!result) return;

  const pending = result();
  if (pending instanceof Promise) {
    pending.catch((error: unknown) => {
      console.error('Failed to run menu action:', error);
    });
  }
}
