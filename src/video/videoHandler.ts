import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { AxiosInstance } from 'axios';
import { Presets, SingleBar } from 'cli-progress';
import { config, VideoQuality } from '../config';
import { httpClient } from '../http/client';
import { selectVideoUrl } from '../mediathek/mediathekClient';
import { EpisodeRecord } from '../mediathek/types';
import { ensureDirectory } from '../output';
import { errorMessage, logger } from '../utils/logger';
import { zipFile } from './archive';

export interface VideoHandlerOptions {
  http?: AxiosInstance;
  quality?: VideoQuality;
  showProgress?: boolean;
}

export interface VideoBatchResult {
  archived: number;
  failed: number;
}

/**
 * Downloads episode videos and stores each one as a ZIP archive
 */
export class VideoHandler {
  private http: AxiosInstance;
  private quality: VideoQuality;
  private showProgress: boolean;

  constructor(options: VideoHandlerOptions = {}) {
    this.http = options.http ?? httpClient;
    this.quality = options.quality ?? config.videoQuality;
    this.showProgress = options.showProgress ?? config.showProgress;
  }

  /**
   * Streams the video of an episode to disk, zips it and removes the raw file
   * @returns Path of the ZIP archive
   */
  async download(record: EpisodeRecord, dir: string): Promise<string> {
    const url = selectVideoUrl(record, this.quality);
    if (!url) {
      throw new Error(`No video URL for ${record.permanentId}`);
    }

    ensureDirectory(dir);
    const videoPath = path.join(dir, `${record.permanentId}.mp4`);
    const zipPath = path.join(dir, `${record.permanentId}.zip`);
    // An archive from an earlier run is only replaced once the new one is complete
    const partialZipPath = `${zipPath}.part`;

    try {
      await this.streamToFile(url, videoPath, record.permanentId);
      await zipFile(videoPath, partialZipPath);
      fs.renameSync(partialZipPath, zipPath);
    } catch (error) {
      fs.rmSync(partialZipPath, { force: true });
      throw error;
    } finally {
      fs.rmSync(videoPath, { force: true });
    }

    return zipPath;
  }

  /**
   * Downloads the videos of every record with a video URL.
   * Failures are logged and do not stop the batch.
   */
  async downloadAll(records: readonly EpisodeRecord[], dir: string): Promise<VideoBatchResult> {
    const result: VideoBatchResult = { archived: 0, failed: 0 };
    const withVideo = records.filter((record) => selectVideoUrl(record, this.quality) !== undefined);

    for (let i = 0; i < withVideo.length; i++) {
      const record = withVideo[i];
      if (!record) continue;

      logger.info(`Downloading video ${i + 1}/${withVideo.length}: ${record.title}`);
      try {
        await this.download(record, dir);
        result.archived++;
      } catch (error) {
        logger.warn(`Video download failed for ${record.permanentId}: ${errorMessage(error)}`);
        result.failed++;
      }
    }

    return result;
  }

  private async streamToFile(url: string, filePath: string, label: string): Promise<void> {
    const response = await this.http.get<Readable>(url, { responseType: 'stream' });
    const total = contentLength(response.headers['content-length']);

    const progressBar = this.showProgress
      ? new SingleBar(
          {
            format:
              total === undefined
                ? `${label} | {value} bytes`
                : `${label} |{bar}| {percentage}% | {value}/{total} bytes`,
            hideCursor: true,
          },
          Presets.shades_classic
        )
      : null;

    progressBar?.start(total ?? 0, 0);
    response.data.on('data', (chunk: Buffer) => {
      progressBar?.increment(chunk.length);
    });

    try {
      await pipeline(response.data, fs.createWriteStream(filePath));
    } finally {
      progressBar?.stop();
    }
  }
}

/**
 * Reads a `content-length` header; undefined when absent or not a positive size
 */
export function contentLength(header: unknown): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') return undefined;
  const length = Number(header);
  return Number.isInteger(length) && length > 0 ? length : undefined;
}
