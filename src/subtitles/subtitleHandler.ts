import fs from 'fs';
import path from 'path';
import { AxiosInstance } from 'axios';
import { httpClient } from '../http/client';
import { EpisodeRecord } from '../mediathek/types';
import { ensureDirectory, toCsv, xmlFileName } from '../output';
import { errorMessage, logger } from '../utils/logger';
import { mergeCues } from './cueMerger';
import { parseTtml } from './ttmlParser';
import { SubtitleCue } from './types';

export const SUBTITLE_CSV_COLUMNS = ['start_time', 'end_time', 'color', 'text'] as const;

export interface BatchResult {
  succeeded: number;
  failed: number;
}

/**
 * Downloads subtitle XML and converts it to CSV
 */
export class SubtitleHandler {
  private http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http = http ?? httpClient;
  }

  /**
   * Downloads the subtitle XML of an episode to `<dir>/<permanentId>.xml`
   * @returns Path of the written file
   */
  async download(record: EpisodeRecord, dir: string): Promise<string> {
    if (!record.subtitleUrl) {
      throw new Error(`No subtitle URL for ${record.permanentId}`);
    }

    const response = await this.http.get<ArrayBuffer>(record.subtitleUrl, {
      responseType: 'arraybuffer',
    });

    const filePath = path.join(ensureDirectory(dir), xmlFileName(record.permanentId));
    fs.writeFileSync(filePath, Buffer.from(response.data));
    return filePath;
  }

  /**
   * Downloads the subtitles of every record that has a subtitle URL.
   * Failures are logged and do not stop the batch.
   */
  async downloadAll(records: readonly EpisodeRecord[], dir: string): Promise<BatchResult> {
    const result: BatchResult = { succeeded: 0, failed: 0 };

    for (const record of records) {
      if (!record.subtitleUrl) continue;

      try {
        await this.download(record, dir);
        result.succeeded++;
      } catch (error) {
        logger.warn(`Subtitle download failed for ${record.permanentId}: ${errorMessage(error)}`);
        result.failed++;
      }
    }

    return result;
  }

  /**
   * Parses one XML subtitle file and writes the merged cues to CSV
   * @returns The cues written
   */
  parseFile(xmlPath: string, csvPath: string): SubtitleCue[] {
    const cues = mergeCues(parseTtml(fs.readFileSync(xmlPath, 'utf-8')));
    const rows = cues.map((cue) => [cue.start, cue.end, cue.color, cue.text]);

    fs.writeFileSync(csvPath, toCsv(SUBTITLE_CSV_COLUMNS, rows), 'utf-8');
    return cues;
  }

  /**
   * Parses the downloaded XML of every record into `<csvDir>/<permanentId>.csv`.
   * Records without an XML file are skipped; parse failures are logged.
   */
  parseAll(records: readonly EpisodeRecord[], xmlDir: string, csvDir: string): BatchResult {
    const result: BatchResult = { succeeded: 0, failed: 0 };
    const inputs = records
      .map((record) => ({
        record,
        xmlPath: path.join(xmlDir, xmlFileName(record.permanentId)),
      }))
      .filter(({ xmlPath }) => fs.existsSync(xmlPath));

    if (inputs.length === 0) return result;

    ensureDirectory(csvDir);
    logger.info(`Parsing ${inputs.length} XML files`);

    for (const { record, xmlPath } of inputs) {
      try {
        this.parseFile(xmlPath, path.join(csvDir, `${record.permanentId}.csv`));
        result.succeeded++;
      } catch (error) {
        logger.warn(`Could not parse subtitles of ${record.permanentId}: ${errorMessage(error)}`);
        result.failed++;
      }
    }

    return result;
  }
}

