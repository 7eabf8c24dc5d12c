import { END_MARKER_OPEN, MARKER_CLOSE, START_MARKER_OPEN } from '../../utils/constants.js';
import type { EmbeddedFile } from './writing.types.js';

const SIZED_LABEL = /^(.*) \((\d+) bytes\)$/;

/**
 * Possible (path, size) readings of a start marker label. A sized reading is
 * tried first; the end marker decides which one holds.
 */
function labelReadings(label: string): Array<{ relativePath: string; size?: number }> {
  const readings: Array<{ relativePath: string; size?: number }> = [];
  const sized = SIZED_LABEL.exec(label);
  if (sized) {
    readings.push({ relativePath: sized[1], size: Number(sized[2]) });
  }
  readings.push({ relativePath: label });
  return readings;
}

/**
 * Offset of the end marker closing content that starts at `from`. With a
 * recorded size, marker text inside the content is skipped by checking the
 * byte length of what precedes each candidate; when none matches, the first
 * candidate is used.
 */
function findEndMarker(text: string, endMarker: string, from: number, size?: number): number {
  const first = text.indexOf(endMarker, from);
  if (size === undefined) {
    return first;
  }
  let endAt = first;
  while (endAt !== -1 && Buffer.byteLength(text.slice(from, endAt), 'utf-8') !== size) {
    endAt = text.indexOf(endMarker, endAt + 1);
  }
  // Content that changed size after the walk, or a read error marker
  return endAt === -1 ? first : endAt;
}

/**
 * Recovers the embedded files of a chunk file from its text.
 *
 * Chunks written with sizes are unambiguous. Without sizes, a file whose
 * content itself contains its own end marker line is cut at that line.
 *
 * @throws Error when the text does not follow the chunk framing
 */
export function parseChunkContent(text: string): EmbeddedFile[] {
  const files: EmbeddedFile[] = [];
  let pos = 0;

  while (pos < text.length) {
    if (!text.startsWith(START_MARKER_OPEN, pos)) {
      throw new Error(`Malformed chunk: expected start marker at offset ${pos}`);
    }
    const headerEnd = text.indexOf('\n', pos);
    const header = headerEnd === -1 ? '' : text.slice(pos + START_MARKER_OPEN.length, headerEnd);
    if (!header.endsWith(MARKER_CLOSE)) {
      throw new Error(`Malformed chunk: unterminated start marker at offset ${pos}`);
    }
    const label = header.slice(0, -MARKER_CLOSE.length);
    const contentStart = headerEnd + 1;

    let next = -1;
    for (const reading of labelReadings(label)) {
      const endMarker = `\n${END_MARKER_OPEN}${reading.relativePath}${MARKER_CLOSE}\n`;
      const endAt = findEndMarker(text, endMarker, contentStart, reading.size);
      if (endAt === -1) {
        continue;
      }
      files.push({ ...reading, content: text.slice(contentStart, endAt) });
      next = endAt + endMarker.length;
      break;
    }

    if (next === -1) {
      throw new Error(`Malformed chunk: missing end marker for "${label}"`);
    }
    pos = text[next] === '\n' ? next + 1 : next;
  }

  return files;
}
