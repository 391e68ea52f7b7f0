import path from 'path';
import { config } from '../config';
import { resolveTimeWindow, RunSummary, ScraperConfiguration, ScraperPipeline } from '../pipelines';
import { defaultPrograms, loadProgramsFile } from '../programs';
import { logger } from '../utils/logger';
import { CliOptions } from './options';

/**
 * Turns command line input into the pipeline configuration
 */
export function resolveConfiguration(outputFolder: string, options: CliOptions): ScraperConfiguration {
  return {
    subtitles: options.subtitles,
    parsed: options.parsed,
    videos: options.videos,
    window: resolveTimeWindow(options.startTime, options.endTime, options.interval),
    outputDir: path.resolve(outputFolder),
    programs: options.config ? loadProgramsFile(options.config) : defaultPrograms(),
  };
}

export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Runs the scraper for the given command line input
 */
export async function runScraper(
  outputFolder: string,
  options: CliOptions,
  pipeline: ScraperPipeline = new ScraperPipeline(),
  today: string = todayIso()
): Promise<RunSummary> {
  const configuration = resolveConfiguration(outputFolder, options);

  logger.info(`Scraping ${Object.keys(configuration.programs).length} programs into ${configuration.outputDir}`);
  logger.debug(`Stages: subtitles=${options.subtitles} parsed=${options.parsed} videos=${options.videos}`);
  logger.debug(`Video quality: ${config.videoQuality}`);

  const summary = await pipeline.run(configuration, today);

  logger.success(
    `Done: ${summary.episodes} episodes from ${summary.programs} programs, ` +
      `${summary.subtitlesDownloaded} subtitles downloaded, ${summary.subtitlesParsed} parsed, ` +
      `${summary.videosArchived} videos archived`
  );
  if (summary.failures > 0) {
    logger.warn(`${summary.failures} downloads or conversions failed, see the warnings above`);
  }

  return summary;
}
