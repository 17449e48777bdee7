import type { LucideIcon } from 'lucide-react';
import styles from './Menu.module.css';

export interface SelectionIndicatorProps {
  selected: boolean;
  glyph: LucideIcon;
  /** Stroke width of the glyph */
  weight: number;
  size: number;
  /** Follows the item's active text color */
  color: string;
}

/**
 * Checkmark shown before a selectable item's title. Unselected items keep an
 * empty box of the same size so toggling does not move the title.
 */
export function SelectionIndicator({
  selected,
  glyph: Glyph,
  weight,
  size,
  color,
}: SelectionIndicatorProps) {
  return (
    <span
      className={styles.selectionIndicator}
      data-part="selection"
      data-checked={selected}
      style={{ width: size, height: size, color }}
      aria-hidden="true"
    >
      {selected && <Glyph size={size} strokeWidth={weight} color="currentColor" />}
    </span>
  );
}
