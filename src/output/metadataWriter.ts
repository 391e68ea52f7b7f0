import fs from 'fs';
import path from 'path';
import { EpisodeRecord } from '../mediathek/types';
import { toCsv } from './csv';
import { getProgramPath, xmlFileName } from './paths';

export const METADATA_COLUMNS = [
  'permanent_id',
  'program',
  'id',
  'channel',
  'topic',
  'title',
  'description',
  'timestamp',
  'duration',
  'url_website',
  'url_subtitle',
  'url_video',
  'url_video_low',
  'url_video_hd',
  'xml_path',
] as const;

/**
 * Writes one CSV row per episode record to `<program>_<date>.csv`
 * @param program - Program name
 * @param date - Run date as YYYY-MM-DD
 * @param records - Episode records, in the order they are written
 * @param outputDir - Root output folder
 * @param xmlDir - Folder holding downloaded subtitle XML; fills the `xml_path` column
 * @returns Path of the written file
 */
export function saveMetadata(
  program: string,
  date: string,
  records: readonly EpisodeRecord[],
  outputDir: string,
  xmlDir?: string
): string {
  const programPath = getProgramPath(outputDir, program, date);
  const filePath = path.join(programPath, `${program}_${date}.csv`);

  const rows = records.map((record) => {
    const xmlName = xmlFileName(record.permanentId);
    const hasXml = xmlDir !== undefined && fs.existsSync(path.join(xmlDir, xmlName));

    return [
      record.permanentId,
      record.program,
      record.id,
      record.channel,
      record.topic,
      record.title,
      record.description,
      record.timestamp.toISOString(),
      record.duration,
      record.websiteUrl,
      record.subtitleUrl,
      record.videoUrl,
      record.videoUrlLow,
      record.videoUrlHd,
      hasXml ? xmlName : '',
    ];
  });

  fs.writeFileSync(filePath, toCsv(METADATA_COLUMNS, rows), 'utf-8');
  return filePath;
}
