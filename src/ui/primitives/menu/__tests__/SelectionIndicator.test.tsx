import { describe, expect, it } from 'vitest';
import { Check } from 'lucide-react';
import { SelectionIndicator } from '../SelectionIndicator';
import { query, render } from '../../../../test/render';

describe('SelectionIndicator', () => {
  it('occupies the same box whether selected or not', () => {
    const { container } = render(
      <div>
        <SelectionIndicator selected glyph={Check} weight={2.5} size={15} color="#000000" />
        <SelectionIndicator selected={false} glyph={Check} weight={2.5} size={15} color="#000000" />
      </div>
    );

    const [on, off] = Array.from(container.querySelectorAll<HTMLElement>('[data-part="selection"]'));
    expect(on.style.width).toBe('15px');
    expect(on.style.height).toBe('15px');
    expect(off.style.width).toBe(on.style.width);
    expect(off.style.height).toBe(on.style.height);
  });

  it('draws the glyph only when selected', () => {
    const { container, rerender } = render(
      <SelectionIndicator selected glyph={Check} weight={3} size={18} color="#000000" />
    );

    const svg = query(container, '[data-part="selection"] svg');
    expect(svg.getAttribute('width')).toBe('18');
    expect(svg.getAttribute('stroke-width')).toBe('3');
    expect(svg.getAttribute('stroke')).toBe('currentColor');

    rerender(<SelectionIndicator selected={false} glyph={Check} weight={3} size={18} color="#000000" />);
    expect(query(container, '[data-part="selection"]').getAttribute('data-checked')).toBe('false');
    expect(container.querySelector('svg')).toBeNull();
  });

  it('paints the glyph in the given color', () => {
    const { container } = render(
      <SelectionIndicator selected glyph={Check} weight={2.5} size={15} color="rgb(255, 69, 58)" />
    );

    expect(query(container, '[data-part="selection"]').style.color).toBe('rgb(255, 69, 58)');
  });
});
