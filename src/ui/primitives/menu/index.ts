/**
 * Menu Primitives
 *
 * Pull-down menu items and the providers they read from.
 *
 * @example
 * ```tsx
 * import { Menu, MenuActionsRow, MenuItem, MenuRouteProvider, runMenuRouteResult } from './ui';
 *
 * <MenuRouteProvider onClose={(result) => { setOpen(false); runMenuRouteResult(result); }}>
 *   <Menu selectable>
 *     <MenuActionsRow size="compact">
 *       <MenuItem title="Copy" icon={Copy} onTap={handleCopy} />
 *       <MenuItem title="Paste" icon={Clipboard} onTap={handlePaste} enabled={canPaste} />
 *     </MenuActionsRow>
 *     <MenuItem title="Sort by name" selected={sort === 'name'} onTap={() => setSort('name')} />
 *     <MenuItem title="Rename…" tapPolicy="popThenDelayedInvoke" onTap={openRenameDialog} />
 *     <MenuItem title="Delete" icon={Trash2} isDestructive onTap={handleDelete} />
 *   </Menu>
 * </MenuRouteProvider>
 * ```
 */

// Containers
export {
  Menu,
  MenuActionsRow,
  type MenuProps,
  type MenuActionsRowProps,
  type MenuActionsRowSize,
} from './Menu';

// Item
export {
  MenuItem,
  type MenuItemProps,
} from './MenuItem';

export {
  MenuItemLayout,
  clampTitleLines,
  leadingIndicatorGap,
  resolveFullMinHeight,
  resolveIconContent,
  type IconContent,
  type MenuItemLayoutProps,
} from './MenuItemLayout';

export {
  SelectionIndicator,
  type SelectionIndicatorProps,
} from './SelectionIndicator';

// Style
export {
  MenuThemeProvider,
  useMenuTheme,
  type MenuBrightness,
  type MenuItemTheme,
  type MenuItemThemeOverride,
  type MenuTextStyle,
  type MenuTheme,
  type MenuThemeContextValue,
  type MenuThemeProviderProps,
} from './MenuTheme';

export { getDefaultItemTheme } from './menuDefaults';

export {
  fadeColor,
  resolveItemStyle,
  selectInteractionStyle,
  type InteractionStyle,
  type ResolvedItemStyle,
  type ResolveItemStyleOptions,
} from './styleCascade';

// Interaction and dispatch
export {
  transitionInteraction,
  useMenuItemInteraction,
  type InteractionEvent,
  type InteractionHandlers,
  type InteractionState,
  type UseMenuItemInteractionReturn,
} from './interaction';

export {
  activateMenuItem,
  type MenuItemTapHandler,
  type TapPolicy,
} from './tapDispatch';

// Host signals
export {
  MenuRouteProvider,
  runMenuRouteResult,
  useMenuRoute,
  type MenuRouteHandle,
  type MenuRouteProviderProps,
  type MenuRouteResult,
} from './MenuRoute';

export {
  TextScaleProvider,
  isLargeTextScale,
  useElementSize,
  useMenuConfig,
  useTextScale,
  type ElementSize,
  type MenuConfig,
  type TextScaleProviderProps,
} from './MenuEnvironment';

export {
  LARGE_TEXT_SCALE_THRESHOLD,
  MENU_CLOSE_DURATION_MS,
  MIN_ITEM_HEIGHT,
} from './constants';
