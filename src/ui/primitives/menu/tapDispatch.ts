/**
 * Tap dispatch for menu items.
 *
 * Decides whether the menu closes before the item's action runs. Nothing here
 * awaits the action or catches what it throws.
 */
import type { MenuRouteHandle } from './MenuRoute';

export type TapPolicy = 'immediate' | 'popThenInvoke' | 'popThenDelayedInvoke';

/** Custom dispatch, called with the enclosing route (if any) and the action */
export type MenuItemTapHandler = (route: MenuRouteHandle | null, onTap: () => void) => void;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function activateMenuItem(
  route: MenuRouteHandle | null,
  onTap: () => void,
  policy: TapPolicy | MenuItemTapHandler
): void {
  if (typeof policy === 'function') {
    policy(route, onTap);
    return;
  }

  // Inline menus have nothing to close.
  if (!route || policy === 'immediate') {
    onTap();
    return;
  }

  if (policy === 'popThenInvoke') {
    route.close(onTap);
    return;
  }

  // Values are captured now, so the action is safe to run after the item unmounts.
  const { closeDurationMs } = route;
  route.close(async () => {
    await wait(closeDurationMs);
    onTap();
  });
}
