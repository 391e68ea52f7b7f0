import { createHash } from 'crypto';
import { AxiosInstance } from 'axios';
import { config, VideoQuality } from '../config';
import { httpClient } from '../http/client';
import { buildQuery, MediathekQuery, ProgramQuery } from '../programs';
import { logger } from '../utils/logger';
import { ApiResponse, ApiResult, apiResponseSchema, EpisodeRecord } from './types';

export interface MediathekClientOptions {
  apiUrl?: string;
  http?: AxiosInstance;
}

/**
 * Client for the MediathekViewWeb query API
 */
export class MediathekClient {
  private apiUrl: string;
  private http: AxiosInstance;

  constructor(options: MediathekClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? config.mediathekApiUrl;
    this.http = options.http ?? httpClient;
  }

  /**
   * Sends a query to the API.
   * Throws on network errors, non-2xx responses, API errors and unexpected payloads.
   */
  async query(body: MediathekQuery): Promise<ApiResponse> {
    // The API reads the JSON body from a text/plain request
    const response = await this.http.post<unknown>(this.apiUrl, JSON.stringify(body), {
      headers: { 'Content-Type': 'text/plain' },
      validateStatus: () => true,
    });

    logger.debug(`API call to ${this.apiUrl} returned status code ${response.status}`);

    if (response.status < 200 || response.status >= 300) {
      throw new Error(`MediathekView API responded with status ${response.status}`);
    }

    const parsed = apiResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected MediathekView API response: ${parsed.error.message}`);
    }

    if (parsed.data.err !== undefined && parsed.data.err !== null) {
      throw new Error(`MediathekView API reported an error: ${JSON.stringify(parsed.data.err)}`);
    }

    return parsed.data;
  }

  /**
   * Fetches the current listing of a program
   * @param program - Program name, used in permanent ids and file names
   * @param programQuery - Query for the program
   * @returns Episode records in API order, without duplicates
   */
  async fetchProgram(program: string, programQuery: ProgramQuery): Promise<EpisodeRecord[]> {
    logger.debug(`Fetching data for ${program}`);

    const response = await this.query(buildQuery(programQuery));
    const results = response.result?.results ?? [];

    logger.debug(`API call returned ${results.length} results for ${program}`);

    const seen = new Set<string>();
    const permanentIds = new Set<string>();
    const records: EpisodeRecord[] = [];

    for (const result of results) {
      const record = toEpisodeRecord(program, result);
      const key = record.subtitleUrl ?? `id:${record.id}`;
      if (seen.has(key)) continue;
      seen.add(key);

      // Broadcasts sharing a timestamp (e.g. a sign-language edition) need distinct file names
      const permanentId = permanentIds.has(record.permanentId)
        ? `${record.permanentId}_${shortHash(record.id)}`
        : record.permanentId;
      permanentIds.add(permanentId);
      records.push(permanentId === record.permanentId ? record : { ...record, permanentId });
    }

    return records;
  }
}

function shortHash(value: string): string {
  return createHash('sha1').update(value).digest('hex').slice(0, 8);
}

function nonEmpty(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function parseDuration(value: ApiResult['duration']): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Maps an API result to an episode record
 */
export function toEpisodeRecord(program: string, result: ApiResult): EpisodeRecord {
  const subtitleUrl = nonEmpty(result.url_subtitle);

  return {
    permanentId: `${program}_${result.timestamp}`,
    program,
    id: result.id,
    channel: result.channel,
    topic: result.topic,
    title: result.title,
    description: result.description,
    timestamp: new Date(result.timestamp * 1000),
    duration: parseDuration(result.duration),
    websiteUrl: result.url_website,
    subtitleUrl: subtitleUrl?.startsWith('https://') ? subtitleUrl : undefined,
    videoUrl: nonEmpty(result.url_video),
    videoUrlLow: nonEmpty(result.url_video_low),
    videoUrlHd: nonEmpty(result.url_video_hd),
  };
}

/**
 * Picks the video URL for the requested quality, falling back to any available one
 */
export function selectVideoUrl(record: EpisodeRecord, quality: VideoQuality): string | undefined {
  switch (quality) {
    case 'low':
      return record.videoUrlLow ?? record.videoUrl ?? record.videoUrlHd;
    case 'hd':
      return record.videoUrlHd ?? record.videoUrl ?? record.videoUrlLow;
    case 'standard':
      return record.videoUrl ?? record.videoUrlLow ?? record.videoUrlHd;
  }
}
