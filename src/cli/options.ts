import { Command, InvalidArgumentError } from 'commander';
import { config } from '../config';

export interface CliOptions {
  subtitles: boolean;
  parsed: boolean;
  videos: boolean;
  startTime?: Date;
  endTime?: Date;
  interval: number;
  config?: string;
}

const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}):(\d{2}))?$/;

/**
 * Parses a `0`/`1` stage toggle
 */
export function parseToggle(value: string): boolean {
  const trimmed = value.trim();
  if (trimmed === '1') return true;
  if (trimmed === '0') return false;
  throw new InvalidArgumentError('Expected 0 or 1.');
}

/**
 * Parses `YYYY-MM-DD`, `YYYY-MM-DDTHH:MM:SS` or `YYYY-MM-DD HH:MM:SS` as UTC
 */
export function parseDateTime(value: string): Date {
  const match = value.trim().match(DATE_TIME_PATTERN);
  if (!match) {
    throw new InvalidArgumentError('Expected YYYY-MM-DD, YYYY-MM-DDTHH:MM:SS or YYYY-MM-DD HH:MM:SS.');
  }

  const [year, month, day, hours, minutes, seconds] = match
    .slice(1)
    .map((part) => (part === undefined ? 0 : parseInt(part, 10)));
  // setUTCFullYear keeps years 0-99 as given, Date.UTC would map them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year ?? 0, (month ?? 1) - 1, day ?? 1);
  date.setUTCHours(hours ?? 0, minutes ?? 0, seconds ?? 0, 0);

  // Out-of-range parts roll over (e.g. 2024-02-30)
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== (month ?? 1) - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    throw new InvalidArgumentError(`Invalid date: ${value}`);
  }
  return date;
}

export function parseInterval(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a non-negative number of days.');
  }
  return parsed;
}

/**
 * Creates the command line definition
 * @param action - Called with the output folder and the parsed options
 */
export function createProgram(
  action: (outputFolder: string, options: CliOptions) => Promise<void>
): Command {
  return new Command()
    .name('mediathek-scraper')
    .description('Scrape news and talkshow programs from the MediathekView archive.')
    .argument('[output-folder]', 'Folder to write metadata, subtitles and videos to', config.outputDir)
    .option('--subtitles <0|1>', 'Download subtitle XML files', parseToggle, true)
    .option('--parsed <0|1>', 'Parse subtitle XML files to CSV', parseToggle, true)
    .option('--videos <0|1>', 'Download and zip video files', parseToggle, true)
    .option('-S, --start-time <date>', 'Start of the broadcast window (UTC)', parseDateTime)
    .option('-E, --end-time <date>', 'End of the broadcast window (UTC)', parseDateTime)
    .option('-I, --interval <days>', 'Window length in days when only one bound is given', parseInterval, 7)
    .option('-c, --config <file>', 'Programs file in YAML format')
    .action(async (outputFolder: string, options: CliOptions) => {
      await action(outputFolder, options);
    });
}
