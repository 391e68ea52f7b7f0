import path from 'path';
import { MediathekClient } from '../mediathek';
import { getProgramPath, saveMetadata, SUBTITLES_FOLDER, VIDEO_FOLDER, XML_FOLDER } from '../output';
import { ProgramMap } from '../programs';
import { SubtitleHandler } from '../subtitles';
import { logger } from '../utils/logger';
import { VideoHandler } from '../video';
import { filterByTimeWindow, TimeWindow } from './timeWindow';

export interface ScraperConfiguration {
  subtitles: boolean;
  parsed: boolean;
  videos: boolean;
  window: TimeWindow | null;
  outputDir: string;
  programs: ProgramMap;
}

export interface RunSummary {
  programs: number;
  episodes: number;
  subtitlesDownloaded: number;
  subtitlesParsed: number;
  videosArchived: number;
  failures: number;
}

export interface ScraperPipelineDependencies {
  client?: MediathekClient;
  subtitleHandler?: SubtitleHandler;
  videoHandler?: VideoHandler;
}

/**
 * Runs metadata, subtitle and video stages for every configured program
 */
export class ScraperPipeline {
  private client: MediathekClient;
  private subtitleHandler: SubtitleHandler;
  private videoHandler: VideoHandler;

  constructor(dependencies: ScraperPipelineDependencies = {}) {
    this.client = dependencies.client ?? new MediathekClient();
    this.subtitleHandler = dependencies.subtitleHandler ?? new SubtitleHandler();
    this.videoHandler = dependencies.videoHandler ?? new VideoHandler();
  }

  /**
   * Scrapes every program in order.
   * A failed metadata request aborts the run; per-episode failures are counted.
   * @param configuration - Stages, time window, output folder and programs
   * @param today - Run date as YYYY-MM-DD, names the output folders
   */
  async run(configuration: ScraperConfiguration, today: string): Promise<RunSummary> {
    const summary: RunSummary = {
      programs: 0,
      episodes: 0,
      subtitlesDownloaded: 0,
      subtitlesParsed: 0,
      videosArchived: 0,
      failures: 0,
    };

    const programs = Object.entries(configuration.programs);

    for (const [index, [program, programQuery]] of programs.entries()) {
      logger.info(`Scraping ${program} (${index + 1}/${programs.length})`);

      const fetched = await this.client.fetchProgram(program, programQuery);
      if (fetched.length === 0) {
        logger.warn(`Querying for '${program}' has returned no data.`);
        continue;
      }

      const records = filterByTimeWindow(fetched, configuration.window);
      if (configuration.window) {
        logger.info(
          `Filtering data between ${configuration.window.start.toISOString()} and ` +
            `${configuration.window.end.toISOString()}. Result has ${records.length} rows.`
        );
      }

      const programPath = getProgramPath(configuration.outputDir, program, today);
      const xmlDir = path.join(programPath, XML_FOLDER);

      if (configuration.subtitles) {
        const result = await this.subtitleHandler.downloadAll(records, xmlDir);
        summary.subtitlesDownloaded += result.succeeded;
        summary.failures += result.failed;
      }

      if (configuration.parsed) {
        const result = this.subtitleHandler.parseAll(
          records,
          xmlDir,
          path.join(programPath, SUBTITLES_FOLDER)
        );
        summary.subtitlesParsed += result.succeeded;
        summary.failures += result.failed;
      }

      if (configuration.videos) {
        const result = await this.videoHandler.downloadAll(
          records,
          path.join(programPath, VIDEO_FOLDER)
        );
        summary.videosArchived += result.archived;
        summary.failures += result.failed;
      }

      saveMetadata(program, today, records, configuration.outputDir, xmlDir);

      summary.programs++;
      summary.episodes += records.length;
    }

    return summary;
  }
}
