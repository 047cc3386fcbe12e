import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  attachWords,
  buildRequest,
  findJobDirs,
  findPendingJobs,
  loadJob,
  parseManifest,
  readStatus,
  waitForJob,
  writeStatus,
} from '../../src/pipeline/job.js';
import { renderSettings } from '../../src/config.js';
import { JobManifestError, PollTimeoutError } from '../../src/errors.js';
import type { Prober } from '../../src/media/probe.js';
import type { MediaProbe, SubtitleCue } from '../../src/types.js';

const SRT = '1\n00:00:00,000 --> 00:00:02,000\nHello there\n\n2\n00:00:02,000 --> 00:00:04,000\nGeneral\n\n';

const settings = renderSettings({ fallbackColor: [20, 20, 40] });

const audioProbe = (durationSeconds: number): MediaProbe => ({
  width: 0, height: 0, durationSeconds, sizeBytes: 1000, hasAudioStream: true, videoCodec: null,
});

const noProbe: Prober = async (file) => {
  throw new Error(`unexpected probe of ${file}`);
};

describe('parseManifest', () => {
  it('accepts a minimal manifest', () => {
    expect(parseManifest('{"audio":"a.mp3","subtitles":"s.srt"}', 'job.json'))
      .toEqual({ audio: 'a.mp3', subtitles: 's.srt' });
  });

  it('rejects malformed JSON with the parse error as cause', () => {
    try {
      parseManifest('{"audio": "a.mp3",', 'job.json');
      expect.unreachable('expected JobManifestError');
    } catch (err) {
      expect(err).toBeInstanceOf(JobManifestError);
      expect(err instanceof JobManifestError && err.cause).toBeInstanceOf(SyntaxError);
    }
  });

  it('names the invalid fields', () => {
    expect(() => parseManifest('{"subtitles":"s.srt","background":{"type":"color","rgb":[0,0,300]}}', 'job.json'))
      .toThrow(/audio: Required.*background\.rgb\.2/);
  });

  it('rejects unknown style keys', () => {
    expect(() => parseManifest('{"audio":"a","subtitles":"s","style":{"fontColour":"red"}}', 'job.json'))
      .toThrow(JobManifestError);
  });
});

describe('attachWords', () => {
  const cues: SubtitleCue[] = [
    { start: 0, end: 2, text: 'a b', words: [] },
    { start: 2, end: 4, text: 'c d', words: [] },
  ];

  it('gives each word to the cue containing its start', () => {
    const out = attachWords(cues, [
      { text: 'a', start: 0.5, end: 1 },
      { text: 'c', start: 2, end: 3 },
      { text: 'd', start: 4, end: 4.2 },
      { text: 'stray', start: 9, end: 9.5 },
    ]);

    expect(out[0]?.words.map(w => w.text)).toEqual(['a']);
    expect(out[1]?.words.map(w => w.text)).toEqual(['c', 'd']);
    expect(cues[0]?.words).toEqual([]);
  });
});

describe('job directories', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-test-'));
    fs.writeFileSync(path.join(dir, 'subs.srt'), SRT);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeManifest(manifest: object, jobDir = dir): void {
    fs.writeFileSync(path.join(jobDir, 'job.json'), JSON.stringify(manifest));
  }

  it('builds a request with paths resolved against the job directory', async () => {
    const request = await buildRequest(dir, parseManifest(JSON.stringify({
      audio: 'narration.mp3',
      audioDuration: 20,
      estimatedDuration: 'last-cue',
      background: { type: 'visual', path: 'footage/bg.mp4' },
      subtitles: 'subs.srt',
      style: { fontSize: 60, fontPath: 'fonts/bold.ttf' },
    }), 'job.json'), { settings, probe: noProbe });

    expect(request.jobId).toBe(path.basename(dir));
    expect(request.audioPath).toBe(path.join(dir, 'narration.mp3'));
    expect(request.audioDuration).toBe(20);
    expect(request.estimatedDuration).toBe(4);
    expect(request.background).toEqual({ kind: 'visual', path: path.join(dir, 'footage', 'bg.mp4') });
    expect(request.cues.map(c => c.text)).toEqual(['Hello there', 'General']);
    expect(request.style.fontSize).toBe(60);
    expect(request.style.fontPath).toBe(path.join(dir, 'fonts', 'bold.ttf'));
    expect(request.style.alignment).toBe('center');
    expect(request.outputPath).toBe(path.join(dir, 'output.mp4'));
  });

  it('probes the audio when its duration is not given', async () => {
    const probe = vi.fn<[string], Promise<MediaProbe>>().mockResolvedValue(audioProbe(17.5));
    const request = await buildRequest(dir, { audio: 'narration.mp3', subtitles: 'subs.srt', id: 'custom' },
      { settings, probe });

    expect(probe).toHaveBeenCalledWith(path.join(dir, 'narration.mp3'));
    expect(request.audioDuration).toBe(17.5);
    expect(request.jobId).toBe('custom');
    expect(request.estimatedDuration).toBeUndefined();
  });

  it('uses the fallback color when no background is given', async () => {
    const request = await buildRequest(dir, { audio: 'a.mp3', audioDuration: 5, subtitles: 'subs.srt' },
      { settings, probe: noProbe });
    expect(request.background).toEqual({ kind: 'color', rgb: [20, 20, 40] });
  });

  it('reports an unreadable subtitles file as a manifest error', async () => {
    await expect(buildRequest(dir, { audio: 'a.mp3', audioDuration: 5, subtitles: 'missing.srt' },
      { settings, probe: noProbe })).rejects.toThrow(JobManifestError);
  });

  it('loads job.json from the directory', async () => {
    writeManifest({ audio: 'a.mp3', audioDuration: 5, subtitles: 'subs.srt', output: 'renders/final.mp4' });
    const request = await loadJob(dir, { settings, probe: noProbe });
    expect(request.outputPath).toBe(path.join(dir, 'renders', 'final.mp4'));
  });

  it('waits until every referenced input exists', async () => {
    writeManifest({ audio: 'late.mp3', audioDuration: 5, subtitles: 'subs.srt' });
    setTimeout(() => fs.writeFileSync(path.join(dir, 'late.mp3'), 'audio'), 30);

    const manifest = await waitForJob(dir, { intervalMs: 10, timeoutMs: 2_000 });
    expect(manifest.audio).toBe('late.mp3');
  });

  it('gives up waiting after the timeout', async () => {
    writeManifest({ audio: 'never.mp3', audioDuration: 5, subtitles: 'subs.srt' });
    await expect(waitForJob(dir, { intervalMs: 10, timeoutMs: 50 })).rejects.toThrow(PollTimeoutError);
  });

  it('finds job directories and skips finished ones', () => {
    for (const name of ['b', 'a', 'empty']) fs.mkdirSync(path.join(dir, name));
    writeManifest({ audio: 'a.mp3', subtitles: 's.srt' }, path.join(dir, 'a'));
    writeManifest({ audio: 'a.mp3', subtitles: 's.srt' }, path.join(dir, 'b'));

    expect(findJobDirs(dir)).toEqual([path.join(dir, 'a'), path.join(dir, 'b')]);

    writeStatus(path.join(dir, 'a'), {
      jobId: 'a', stage: 'Done', percent: 100, message: 'complete', updatedAt: '2026-01-01T00:00:00.000Z',
    });
    expect(findPendingJobs(dir)).toEqual([path.join(dir, 'b')]);
  });

  it('round-trips the status file', () => {
    const progress = {
      jobId: 'job-1',
      stage: 'Failed' as const,
      percent: 50,
      message: 'Encoder exited with code 1: Conversion failed!',
      updatedAt: '2026-01-01T00:00:00.000Z',
      errorCode: 'ENCODING_FAILED',
    };
    writeStatus(dir, progress);
    expect(readStatus(dir)).toEqual(progress);
  });

  it('has no status before a job runs', () => {
    expect(readStatus(dir)).toBeUndefined();
    expect(findJobDirs(path.join(dir, 'nope'))).toEqual([]);
  });
});
