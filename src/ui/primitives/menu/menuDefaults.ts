import { Check } from 'lucide-react';
import type { MenuBrightness, MenuItemTheme } from './MenuTheme';

const lightDefaults: MenuItemTheme = {
  textStyle: {
    color: '#000000',
    fontSize: 17,
    lineHeight: 22,
    fontWeight: 400,
    letterSpacing: -0.4,
  },
  iconActionTextStyle: {
    color: '#000000',
    fontSize: 13,
    lineHeight: 18,
    fontWeight: 400,
    letterSpacing: -0.1,
  },
  onHoverTextStyle: {
    color: '#FFFFFF',
    fontSize: 17,
    lineHeight: 22,
    fontWeight: 400,
    letterSpacing: -0.4,
  },
  onHoverColor: '#007AFF',
  pressedColor: 'rgba(0, 0, 0, 0.08)',
  destructiveColor: '#FF3B30',
  disabledOpacity: 0.3,
  iconSize: 20,
  checkmark: Check,
  checkmarkWeight: 2.5,
  checkmarkSize: 15,
};

const darkDefaults: MenuItemTheme = {
  ...lightDefaults,
  textStyle: { ...lightDefaults.textStyle, color: '#FFFFFF' },
  iconActionTextStyle: { ...lightDefaults.iconActionTextStyle, color: '#FFFFFF' },
  onHoverColor: '#0A84FF',
  pressedColor: 'rgba(255, 255, 255, 0.1)',
  destructiveColor: '#FF453A',
  disabledOpacity: 0.35,
};

/**
 * Static bottom layer of the style cascade.
 */
export function getDefaultItemTheme(brightness: MenuBrightness): MenuItemTheme {
  return brightness === 'dark' ? darkDefaults : lightDefaults;
}
