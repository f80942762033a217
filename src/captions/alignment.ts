import {
  AlignmentResult,
  HorizontalAlignment,
  SubtitlePosition,
  VerticalPosition,
} from './types';

const HORIZONTAL_CODES: Record<HorizontalAlignment, number> = {
  left: 1,
  center: 2,
  right: 3,
};

const VERTICAL_BASES: Record<VerticalPosition, number> = {
  top: 7,
  middle: 4,
  bottom: 1,
};

/** Vertical center of each grid row as a fraction of the video height */
const VERTICAL_CENTER_FRACTIONS: Record<VerticalPosition, number> = {
  top: 1 / 6,
  middle: 1 / 2,
  bottom: 5 / 6,
};

/** Anchor code base for explicit coordinates: always the middle row */
const EXPLICIT_VERTICAL_BASE = 4;

/**
 * Splits a grid position such as "top_right" into its row and column
 */
export function splitPosition(position: SubtitlePosition): [VerticalPosition, HorizontalAlignment] {
  const [vertical, horizontal] = position.split('_');
  return [
    vertical === 'top' || vertical === 'bottom' ? vertical : 'middle',
    horizontal === 'left' || horizontal === 'right' ? horizontal : 'center',
  ];
}

/**
 * Determines the \an anchor code and \pos coordinates for a style run.
 *
 * With explicit x and y the position keyword is ignored: the anchor sits in the
 * middle row and the alignment picks its column. Without them the frame is a 3x3
 * grid; the position picks the cell, the alignment picks the left boundary, the
 * midline or the right boundary of that cell, and y is the cell's vertical center.
 */
export function determineAlignmentCode(
  position: SubtitlePosition,
  alignment: HorizontalAlignment,
  x: number | undefined,
  y: number | undefined,
  videoWidth: number,
  videoHeight: number
): AlignmentResult {
  const horizontalCode = HORIZONTAL_CODES[alignment];

  if (x !== undefined && y !== undefined) {
    return {
      anchorCode: EXPLICIT_VERTICAL_BASE + (horizontalCode - 1),
      x: Math.round(x),
      y: Math.round(y),
    };
  }

  const [row, column] = splitPosition(position);

  const verticalCenter = videoHeight * VERTICAL_CENTER_FRACTIONS[row];

  const columnIndex = HORIZONTAL_CODES[column] - 1;
  const leftBoundary = (columnIndex * videoWidth) / 3;
  const rightBoundary = ((columnIndex + 1) * videoWidth) / 3;

  const cellPoints: Record<HorizontalAlignment, number> = {
    left: leftBoundary,
    center: (leftBoundary + rightBoundary) / 2,
    right: rightBoundary,
  };
  const finalX = cellPoints[alignment];

  return {
    anchorCode: VERTICAL_BASES[row] + (horizontalCode - 1),
    x: Math.round(finalX),
    y: Math.round(verticalCenter),
  };
}

/**
 * Formats the per-event override block pinning the text, e.g. {\an7\pos(1280,180)}
 */
export function formatPositionTag(result: AlignmentResult): string {
  return `{\\an${result.anchorCode}\\pos(${result.x},${result.y})}`;
}
