import { describe, expect, it } from 'vitest';
import { Share } from 'lucide-react';
import {
  assertIconForSize,
  clampTitleLines,
  leadingIndicatorGap,
  resolveFullMinHeight,
  resolveIconContent,
} from '../MenuItemLayout';

describe('clampTitleLines', () => {
  it('keeps titles within the limit as they are', () => {
    expect(clampTitleLines('Open in New Window', 2)).toEqual(['Open in New Window']);
    expect(clampTitleLines('First\nSecond', 2)).toEqual(['First', 'Second']);
  });

  it('drops extra lines and ellipsizes the last kept one', () => {
    expect(clampTitleLines('One\nTwo\nThree', 2)).toEqual(['One', 'Two…']);
    expect(clampTitleLines('One\nTwo\nThree\nFour', 3)).toEqual(['One', 'Two', 'Three…']);
    expect(clampTitleLines('One\nTwo', 1)).toEqual(['One…']);
  });
});

describe('leadingIndicatorGap', () => {
  it('scales with the text scale', () => {
    expect(leadingIndicatorGap(1)).toBe(3);
    expect(leadingIndicatorGap(1.2)).toBeCloseTo(3.6);
  });

  it('doubles at large text scales', () => {
    expect(leadingIndicatorGap(2)).toBe(12);
  });
});

describe('resolveFullMinHeight', () => {
  it('never shrinks below the minimum item height', () => {
    expect(resolveFullMinHeight(0.8)).toBe(44);
    expect(resolveFullMinHeight(1)).toBe(44);
    expect(resolveFullMinHeight(1.5)).toBe(66);
  });
});

describe('resolveIconContent', () => {
  it('tags glyphs and custom content', () => {
    expect(resolveIconContent(Share, undefined)).toEqual({ kind: 'glyph', glyph: Share });
    expect(resolveIconContent(undefined, 'A')).toEqual({ kind: 'custom', content: 'A' });
    expect(resolveIconContent(undefined, null)).toBeNull();
  });

  it('rejects both icon kinds at once', () => {
    expect(() => resolveIconContent(Share, 'A')).toThrow('Please provide either icon or customIcon');
  });
});

describe('assertIconForSize', () => {
  it('requires an icon in action rows', () => {
    expect(() => assertIconForSize('compact', null)).toThrow(
      'Either icon or customIcon should be provided for compact menu items'
    );
    expect(() => assertIconForSize('standard', null)).toThrow(
      'Either icon or customIcon should be provided for standard menu items'
    );
  });

  it('accepts full items without an icon', () => {
    expect(() => assertIconForSize('full', null)).not.toThrow();
    expect(() => assertIconForSize('compact', { kind: 'glyph', glyph: Share })).not.toThrow();
  });
});
