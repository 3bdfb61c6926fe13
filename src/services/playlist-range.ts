/**
 * Playlist item selection ("1-3,7,10-") parsing and position mapping.
 * Used for progress display only; the backend applies the selection itself.
 */

export interface PlaylistRange {
  readonly start: number;
  /** null for an open range ("10-") */
  readonly end: number | null;
}

export type PlaylistRangeSet = readonly PlaylistRange[];

const RANGE_TOKEN = /^(\d+)(?:-(\d*))?$/;

/**
 * Parse a comma-separated selection. Malformed tokens (non-numeric, reversed,
 * zero or negative) are dropped.
 */
export function parsePlaylistRanges(spec: string): PlaylistRangeSet {
  const ranges: PlaylistRange[] = [];
  for (const token of spec.split(",")) {
    const match = RANGE_TOKEN.exec(token.trim());
    if (!match) continue;

    const start = parseInt(match[1], 10);
    if (start < 1) continue;

    if (match[2] === undefined) {
      ranges.push({ start, end: start });
    } else if (match[2] === "") {
      ranges.push({ start, end: null });
    } else {
      const end = parseInt(match[2], 10);
      if (end < start) continue;
      ranges.push({ start, end });
    }
  }
  return ranges;
}

/**
 * Number of selected items, or null when unknown (open range or nothing).
 */
export function totalCount(ranges: PlaylistRangeSet): number | null {
  if (ranges.length === 0) return null;
  let total = 0;
  for (const range of ranges) {
    if (range.end === null) return null;
    total += range.end - range.start + 1;
  }
  return total;
}

/**
 * 1-based position of a playlist index within the selection.
 */
export function positionOf(
  ranges: PlaylistRangeSet,
  index: number,
): number | null {
  let offset = 0;
  for (const range of ranges) {
    if (index >= range.start && (range.end === null || index <= range.end)) {
      return offset + (index - range.start) + 1;
    }
    if (range.end === null) return null;
    offset += range.end - range.start + 1;
  }
  return null;
}

export function includes(ranges: PlaylistRangeSet, index: number): boolean {
  return positionOf(ranges, index) !== null;
}

/**
 * "k of N" for a playlist item, "k" when N is unknown, and the absolute
 * index when the item falls outside the selection.
 */
export function formatPlaylistItemLabel(
  ranges: PlaylistRangeSet | null,
  index: number,
  playlistCount: number | null,
): string {
  if (!ranges || ranges.length === 0) {
    return playlistCount ? `${index} of ${playlistCount}` : `${index}`;
  }
  const position = positionOf(ranges, index);
  if (position === null) return `${index}`;
  const total = totalCount(ranges);
  return total === null ? `${position}` : `${position} of ${total}`;
}

export function createPlaylistRangeMapper(spec: string) {
  const ranges = parsePlaylistRanges(spec);
  return {
    ranges,
    totalCount: () => totalCount(ranges),
    positionOf: (index: number) => positionOf(ranges, index),
    includes: (index: number) => includes(ranges, index),
    labelFor: (index: number, playlistCount: number | null = null) =>
      formatPlaylistItemLabel(ranges, index, playlistCount),
  };
}

export type PlaylistRangeMapper = ReturnType<typeof createPlaylistRangeMapper>;
