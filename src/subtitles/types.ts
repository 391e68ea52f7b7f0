/**
 * One `<p>` of a TTML subtitle document
 */
export interface RawCue {
  /** Raw `begin` attribute, e.g. "10:00:01.120" */
  start: string;
  /** Raw `end` attribute */
  end: string;
  text: string;
  /** Id of the declared style used by the cue's spans, '' when unstyled */
  color: string;
}

/**
 * A merged subtitle line as written to the parsed CSV
 */
export interface SubtitleCue {
  start: string;
  end: string;
  text: string;
  /** Style id; broadcasters use a colour per speaker */
  color: string;
}
