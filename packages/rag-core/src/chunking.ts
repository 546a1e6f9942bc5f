import { z } from 'zod';
import type { Chunk } from './types.js';

export const DEFAULT_MAX_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 100;

export const ChunkingOptionsSchema = z
  .object({
    /** Upper bound on the length of every chunk's text, in characters. */
    maxChunkSize: z.number().int().positive().default(DEFAULT_MAX_CHUNK_SIZE),
    /** Characters shared by consecutive windows when text has to be cut at fixed size. */
    chunkOverlap: z.number().int().nonnegative().default(DEFAULT_CHUNK_OVERLAP),
  })
  .refine((options) => options.chunkOverlap < options.maxChunkSize, {
    message: 'chunkOverlap must be smaller than maxChunkSize',
    path: ['chunkOverlap'],
  });

export type ChunkingOptions = z.infer<typeof ChunkingOptionsSchema>;

/** What the segmenter needs to know about an extracted document. */
export interface SegmentInput {
  documentId: string;
  source: string;
  text: string;
  ocrDerived: boolean;
  /** Offsets at which pages start in `text`; empty when the format has no pages. */
  pageOffsets: number[];
}

// --- Structural markers ---

interface MarkerLevel {
  name: 'section' | 'paragraph' | 'clause';
  pattern: RegExp;
  label: (match: RegExpExecArray) => string;
}

/**
 * Marker levels from coarsest to finest. Every pattern is anchored at a line start.
 */
export const MARKER_LEVELS: readonly MarkerLevel[] = [
  {
    name: 'section',
    pattern:
      /^[ \t]*(?:§{1,2}[ \t]*(\d+[a-z]?)\b|Art(?:ikel|\.)[ \t]*(\d+[a-z]?)\b|(Abschnitt|Teil|Kapitel)[ \t]+([IVXLC]+|\d+)\b)/gm,
    label: (match) => {
      if (match[1]) return `§ ${match[1]}`;
      if (match[2]) return `Art. ${match[2]}`;
      return `${match[3]} ${match[4]}`;
    },
  },
  {
    name: 'paragraph',
    pattern: /^[ \t]*\((\d+[a-z]?)\)/gm,
    label: (match) => `Abs. ${match[1]}`,
  },
  {
    name: 'clause',
    pattern: /^[ \t]*(?:(\d+)\.(?=[ \t])|([a-z])\)|Nr\.[ \t]*(\d+)\b)/gm,
    label: (match) => {
      if (match[1]) return `Nr. ${match[1]}`;
      if (match[2]) return `lit. ${match[2]}`;
      return `Nr. ${match[3]}`;
    },
  },
];

interface Marker {
  index: number;
  label: string;
}

interface Unit {
  start: number;
  end: number;
  /** `null` for text preceding the first marker. */
  label: string | null;
}

interface Piece {
  start: number;
  end: number;
  path: string[];
  strategy: 'structural' | 'window';
}

function findMarkers(text: string, start: number, end: number, level: number): Marker[] {
  const { pattern, label } = MARKER_LEVELS[level];
  const regex = new RegExp(pattern.source, pattern.flags);
  const span = text.slice(start, end);
  const markers: Marker[] = [];
  let match = regex.exec(span);
  while (match !== null) {
    markers.push({ index: start + match.index, label: label(match) });
    match = regex.exec(span);
  }
  return markers;
}

function firstLevelWithMarkers(text: string, start: number, end: number, fromLevel: number): number | null {
  for (let level = fromLevel; level < MARKER_LEVELS.length; level++) {
    if (findMarkers(text, start, end, level).length > 0) return level;
  }
  return null;
}

function splitIntoUnits(text: string, start: number, end: number, markers: Marker[]): Unit[] {
  const units: Unit[] = [];
  if (markers.length === 0) return [{ start, end, label: null }];
  if (markers[0].index > start) {
    units.push({ start, end: markers[0].index, label: null });
  }
  markers.forEach((marker, i) => {
    const next = markers[i + 1];
    units.push({ start: marker.index, end: next ? next.index : end, label: marker.label });
  });
  return units;
}

/**
 * A heading before the first marker (a statute title, `§ 5 Gebühren` above its `(1)`) is
 * folded into the first unit when both fit one chunk, so it is not indexed on its own.
 */
function mergeLeadingUnit(units: Unit[], maxSize: number): Unit[] {
  const [lead, first, ...rest] = units;
  if (!lead || !first || lead.label !== null || first.end - lead.start > maxSize) return units;
  return [{ start: lead.start, end: first.end, label: first.label }, ...rest];
}

/** Narrows a span to its non-whitespace content; `null` if nothing is left. */
function trimSpan(text: string, start: number, end: number): { start: number; end: number } | null {
  let s = start;
  let e = end;
  while (s < e && /\s/.test(text[s])) s++;
  while (e > s && /\s/.test(text[e - 1])) e--;
  return s < e ? { start: s, end: e } : null;
}

/**
 * Fixed-size windows over `[start, end)`. Consecutive windows share exactly `overlap` characters.
 */
export function windowSpans(start: number, end: number, maxSize: number, overlap: number): Array<[number, number]> {
  if (end - start <= maxSize) return [[start, end]];
  const spans: Array<[number, number]> = [];
  const step = Math.max(1, maxSize - overlap);
  let position = start;
  while (position < end) {
    const windowEnd = Math.min(position + maxSize, end);
    spans.push([position, windowEnd]);
    if (windowEnd === end) break;
    position += step;
  }
  return spans;
}

function windowPieces(text: string, start: number, end: number, path: string[], options: ChunkingOptions): Piece[] {
  return windowSpans(start, end, options.maxChunkSize, options.chunkOverlap)
    .filter(([s, e]) => text.slice(s, e).trim() !== '')
    .map(([s, e]) => ({ start: s, end: e, path, strategy: 'window' }));
}

function collectUnit(
  text: string,
  unit: Unit,
  level: number,
  parentPath: string[],
  options: ChunkingOptions,
): Piece[] {
  const path = unit.label ? [...parentPath, unit.label] : parentPath;
  const span = trimSpan(text, unit.start, unit.end);
  if (!span) return [];
  if (span.end - span.start <= options.maxChunkSize) {
    return [{ ...span, path, strategy: 'structural' }];
  }

  // Oversized: descend to the next level that has markers inside this unit.
  const nextLevel = firstLevelWithMarkers(text, span.start, span.end, level + 1);
  if (nextLevel === null) {
    return windowPieces(text, span.start, span.end, path, options);
  }
  const markers = findMarkers(text, span.start, span.end, nextLevel);
  const units = mergeLeadingUnit(splitIntoUnits(text, span.start, span.end, markers), options.maxChunkSize);
  return units.flatMap((sub) =>
    collectUnit(text, sub, nextLevel, path, options),
  );
}

function pageAt(pageOffsets: number[], offset: number): number | undefined {
  if (pageOffsets.length === 0) return undefined;
  let page = 1;
  for (let i = 0; i < pageOffsets.length; i++) {
    if (pageOffsets[i] <= offset) page = i + 1;
    else break;
  }
  return page;
}

/**
 * Splits extracted text into chunks aligned to the structure of administrative prose.
 *
 * The coarsest marker level present in the text (sections, then paragraphs, then clauses)
 * defines the top-level units. Oversized units descend to finer levels and, at the bottom,
 * are cut into overlapping windows that keep the unit's path. When the text has no markers,
 * or a single unit spans the whole oversized document with nothing finer inside it, the
 * document is cut into windows and the chunks carry an empty structural path.
 * Nothing is truncated.
 */
export function segment(input: SegmentInput, options: Partial<ChunkingOptions> = {}): Chunk[] {
  const resolved = ChunkingOptionsSchema.parse(options);
  const { text } = input;
  const whole = trimSpan(text, 0, text.length);
  if (!whole) return [];

  const fitsWhole = whole.end - whole.start <= resolved.maxChunkSize;
  const topLevel = firstLevelWithMarkers(text, whole.start, whole.end, 0);
  const units =
    topLevel === null
      ? []
      : mergeLeadingUnit(
          splitIntoUnits(text, whole.start, whole.end, findMarkers(text, whole.start, whole.end, topLevel)),
          resolved.maxChunkSize,
        );
  const tooSparse =
    topLevel !== null &&
    units.length < 2 &&
    !fitsWhole &&
    firstLevelWithMarkers(text, whole.start, whole.end, topLevel + 1) === null;

  let pieces: Piece[];
  if (topLevel === null || tooSparse) {
    console.log(`[Segmenter] No usable structure in '${input.documentId}', splitting into windows.`);
    pieces = windowPieces(text, whole.start, whole.end, [], resolved);
  } else {
    pieces = units.flatMap((unit) => collectUnit(text, unit, topLevel, [], resolved));
  }

  return pieces.map((piece, sequenceIndex) => ({
    id: `${input.documentId}::chunk_${sequenceIndex}`,
    documentId: input.documentId,
    text: piece.strategy === 'window' ? text.slice(piece.start, piece.end) : text.slice(piece.start, piece.end).trim(),
    structuralPath: piece.path,
    sequenceIndex,
    ocrDerived: input.ocrDerived,
    metadata: {
      source: input.source,
      page: pageAt(input.pageOffsets, piece.start),
      startOffset: piece.start,
      endOffset: piece.end,
      strategy: piece.strategy,
    },
  }));
}
