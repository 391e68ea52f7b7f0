import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { beforeEach, describe, it, expect, vi } from 'vitest';
import { createFakeHttp } from '../test/fakeHttp';
import { createTempDir, episodeRecord } from '../test/records';
import { zipFile } from './archive';
import { contentLength, VideoHandler } from './videoHandler';

const VIDEO_URL = 'https://media.test/video/1_low.mp4';
const BROKEN_URL = 'https://media.test/video/broken.mp4';
const VIDEO_BYTES = 'fake-video-bytes';

function createHandler(): VideoHandler {
  const { http } = createFakeHttp({
    [VIDEO_URL]: () => ({
      data: Readable.from([Buffer.from(VIDEO_BYTES)], { objectMode: false }),
      headers: { 'content-length': String(VIDEO_BYTES.length) },
    }),
    [BROKEN_URL]: { status: 404 },
  });
  return new VideoHandler({ http, quality: 'low', showProgress: false });
}

describe('zipFile', () => {
  it('should create a ZIP archive containing the file', async () => {
    const dir = createTempDir('zip');
    const source = path.join(dir, 'clip.mp4');
    const target = path.join(dir, 'clip.zip');
    fs.writeFileSync(source, 'video');

    await zipFile(source, target);

    const archive = fs.readFileSync(target);
    expect(archive.subarray(0, 2).toString('latin1')).toBe('PK');
    expect(archive.includes(Buffer.from('clip.mp4'))).toBe(true);
  });
});

describe('VideoHandler', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('videos');
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('should store the video as a ZIP archive and remove the raw file', async () => {
    const zipPath = await createHandler().download(episodeRecord(), dir);

    expect(zipPath).toBe(path.join(dir, 'tagesschau_1609459200.zip'));
    expect(fs.readdirSync(dir)).toEqual(['tagesschau_1609459200.zip']);
  });

  it('should leave no files behind when the download fails', async () => {
    const record = episodeRecord({ videoUrlLow: BROKEN_URL });

    await expect(createHandler().download(record, dir)).rejects.toThrow('status code 404');
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('should keep an archive from an earlier run when the download fails', async () => {
    const existing = path.join(dir, 'tagesschau_1609459200.zip');
    fs.writeFileSync(existing, 'earlier archive');
    const record = episodeRecord({ videoUrlLow: BROKEN_URL });

    await expect(createHandler().download(record, dir)).rejects.toThrow('status code 404');
    expect(fs.readdirSync(dir)).toEqual(['tagesschau_1609459200.zip']);
    expect(fs.readFileSync(existing, 'utf-8')).toBe('earlier archive');
  });

  it('should replace an archive from an earlier run after a successful download', async () => {
    const existing = path.join(dir, 'tagesschau_1609459200.zip');
    fs.writeFileSync(existing, 'earlier archive');

    await createHandler().download(episodeRecord(), dir);

    expect(fs.readdirSync(dir)).toEqual(['tagesschau_1609459200.zip']);
    expect(fs.readFileSync(existing).subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('should reject records without video URL', async () => {
    const record = episodeRecord({ videoUrl: undefined, videoUrlLow: undefined, videoUrlHd: undefined });

    await expect(createHandler().download(record, dir)).rejects.toThrow(
      'No video URL for tagesschau_1609459200'
    );
  });

  it('should continue the batch after a failed download', async () => {
    const records = [
      episodeRecord({ permanentId: 'broken', videoUrlLow: BROKEN_URL }),
      episodeRecord({ permanentId: 'none', videoUrl: undefined, videoUrlLow: undefined }),
      episodeRecord({ permanentId: 'ok' }),
    ];

    const result = await createHandler().downloadAll(records, dir);

    expect(result).toEqual({ archived: 1, failed: 1 });
    expect(fs.readdirSync(dir)).toEqual(['ok.zip']);
  });
});

describe('contentLength', () => {
  it('should read a positive size', () => {
    expect(contentLength('1024')).toBe(1024);
    expect(contentLength(2048)).toBe(2048);
  });

  it('should return undefined for a missing or unusable header', () => {
    expect(contentLength(undefined)).toBeUndefined();
    expect(contentLength('')).toBeUndefined();
    expect(contentLength('0')).toBeUndefined();
    expect(contentLength('abc')).toBeUndefined();
  });
});
