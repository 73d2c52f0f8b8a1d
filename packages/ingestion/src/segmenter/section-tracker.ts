import type { LayoutBlock } from '@ledgerlens/model';

/**
 * Heading position inside a page's rebuilt prose
 */
export interface HeadingMarker {
  /** Offset of the heading marker in the prose string */
  offset: number;
  text: string;
}

/**
 * Last heading text of a page, or `carried` when it has none.
 *
 * One step of the fold over pages in document order that yields the
 * section in effect at the start of each page.
 */
export function sectionAfterPage(
  blocks: readonly LayoutBlock[],
  carried: string,
): string {
  const headings = blocks.filter((block) => block.role === 'heading');
  return headings.at(-1)?.text ?? carried;
}

/**
 * Section for a text window starting at `offset`: the last heading whose
 * marker starts at or before it.
 */
export function sectionForOffset(
  markers: readonly HeadingMarker[],
  offset: number,
  carried: string,
): string {
  let section = carried;
  for (const marker of markers) {
    if (marker.offset <= offset) {
      section = marker.text;
    }
  }
  return section;
}

/**
 * Section for a table or figure: the last heading whose top edge is at or
 * above the region's top edge.
 */
export function sectionForRegion(
  blocks: readonly LayoutBlock[],
  regionTop: number,
  carried: string,
): string {
  let section = carried;
  for (const block of blocks) {
    if (block.role === 'heading' && block.bbox[1] <= regionTop) {
      section = block.text;
    }
  }
  return section;
}
