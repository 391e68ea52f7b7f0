import { RawCue, SubtitleCue } from './types';

// Marker for the jingle at the start of a news broadcast
const JINGLE_MARKER = '* Gong *';
const SENTENCE_END = /[.?!]$/;

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Merges raw cues into sentence-level subtitle lines.
 * A line is closed by a cue ending in `.`, `?` or `!`, or by a change of colour
 * (speaker). Jingle cues and empty lines are dropped.
 * @param rawCues - Cues in document order
 * @returns Merged cues in document order
 */
export function mergeCues(rawCues: readonly RawCue[]): SubtitleCue[] {
  const merged: SubtitleCue[] = [];
  let current: SubtitleCue | null = null;

  const flush = (line: SubtitleCue | null): null => {
    if (line) {
      const text = normalizeText(line.text);
      if (text !== '') {
        merged.push({ ...line, text });
      }
    }
    return null;
  };

  for (const cue of rawCues) {
    if (cue.text.includes(JINGLE_MARKER)) continue;

    if (current && current.color !== cue.color) {
      current = flush(current);
    }

    if (current) {
      current.text = `${current.text} ${cue.text}`;
      current.end = cue.end;
    } else {
      current = { start: cue.start, end: cue.end, text: cue.text, color: cue.color };
    }

    if (SENTENCE_END.test(cue.text.trim())) {
      current = flush(current);
    }
  }

  flush(current);
  return merged;
}
