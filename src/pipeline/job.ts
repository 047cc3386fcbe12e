/**
 * Job directories.
 *
 *   <jobDir>/job.json      manifest (see JobManifestSchema)
 *   <jobDir>/status.json   progress mirror written while the job runs
 *
 * Relative paths in the manifest resolve against the job directory.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_STYLE, MANIFEST_RETRY_POLICY, type RenderSettings } from '../config.js';
import { JobManifestError } from '../errors.js';
import type { Prober } from '../media/probe.js';
import { parseSrt } from '../subtitles/srt.js';
import { inferEstimatedDuration } from '../subtitles/timing.js';
import { logger } from '../utils/logger.js';
import { pollUntil, withRetry } from '../utils/retry.js';
import type { JobProgress } from './registry.js';
import type { AssemblyRequest, BackgroundSource, StyleConfig, SubtitleCue, WordTiming } from '../types.js';

export const MANIFEST_FILE = 'job.json';
export const STATUS_FILE = 'status.json';
export const DEFAULT_OUTPUT_FILE = 'output.mp4';

// ── Schema ────────────────────────────────────────────────────────────────────

const channel = z.number().int().min(0).max(255);

const BackgroundSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('visual'), path: z.string().min(1) }),
  z.object({ type: z.literal('color'),  rgb: z.tuple([channel, channel, channel]) }),
  z.object({ type: z.literal('avatar'), path: z.string().min(1) }),
]);

const WordSchema = z.object({
  text:  z.string(),
  start: z.number().min(0),
  end:   z.number().min(0),
});

const StyleSchema = z.object({
  fontFamily:    z.string().min(1),
  fontPath:      z.string().min(1),
  fontSize:      z.number().positive(),
  fillColor:     z.string().min(1),
  outlineColor:  z.string().min(1),
  outlineWidth:  z.number().int().min(0),
  marginBottom:  z.number().int().min(0),
  alignment:     z.enum(['left', 'center', 'right']),
  highlightMode: z.enum(['static', 'word-reveal']),
  bitmapHeight:  z.number().int().positive(),
  lineSpacing:   z.number().int().min(0),
}).partial().strict();

export const JobManifestSchema = z.object({
  id:                z.string().min(1).optional(),
  audio:             z.string().min(1),
  audioDuration:     z.number().positive().optional(),
  estimatedDuration: z.union([z.number(), z.literal('last-cue')]).optional(),
  background:        BackgroundSchema.optional(),
  subtitles:         z.string().min(1),
  words:             z.array(WordSchema).optional(),
  style:             StyleSchema.optional(),
  output:            z.string().min(1).optional(),
});

export type JobManifest = z.infer<typeof JobManifestSchema>;

const JobProgressSchema = z.object({
  jobId:     z.string(),
  stage:     z.enum(['Idle', 'ReconcilingTiming', 'PreparingBackground', 'RasterizingCues',
                     'Compositing', 'Validating', 'Done', 'Failed']),
  percent:   z.number(),
  message:   z.string(),
  updatedAt: z.string(),
  errorCode: z.string().optional(),
});

// ── Manifest ──────────────────────────────────────────────────────────────────

export function parseManifest(raw: string, source: string): JobManifest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new JobManifestError(`${source}: not valid JSON`, err);
  }
  const parsed = JobManifestSchema.safeParse(json);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new JobManifestError(`${source}: ${invalid}`);
  }
  return parsed.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Truncated JSON or a file that has not appeared yet may still be mid-write. */
function isTransientManifestError(err: unknown): boolean {
  return isMissingFile(err) || (err instanceof JobManifestError && err.cause instanceof SyntaxError);
}

export async function readManifest(jobDir: string): Promise<JobManifest> {
  const file = path.join(jobDir, MANIFEST_FILE);
  return withRetry(
    async () => parseManifest(await fs.promises.readFile(file, 'utf-8'), file),
    { ...MANIFEST_RETRY_POLICY, isRetryable: isTransientManifestError },
  );
}

// ── Request building ──────────────────────────────────────────────────────────

/**
 * Give each word to the cue whose [start, end) contains the word's start.
 * The last cue also takes words starting exactly at its end.
 */
export function attachWords(cues: readonly SubtitleCue[], words: readonly WordTiming[]): SubtitleCue[] {
  const buckets: WordTiming[][] = cues.map(() => []);
  let unplaced = 0;

  for (const word of words) {
    const index = cues.findIndex((cue, i) =>
      word.start >= cue.start && (word.start < cue.end || (i === cues.length - 1 && word.start === cue.end)));
    const bucket = buckets[index];
    if (bucket) bucket.push({ ...word });
    else unplaced++;
  }

  if (unplaced > 0) logger.debug('Job: words outside every cue were dropped', { unplaced });
  return cues.map((cue, i) => ({ ...cue, words: buckets[i] ?? [] }));
}

function resolveBackground(jobDir: string, manifest: JobManifest, settings: RenderSettings): BackgroundSource {
  const bg = manifest.background;
  if (!bg) return { kind: 'color', rgb: settings.fallbackColor };
  switch (bg.type) {
    case 'visual': return { kind: 'visual', path: path.resolve(jobDir, bg.path) };
    case 'avatar': return { kind: 'avatar', path: path.resolve(jobDir, bg.path) };
    case 'color':  return { kind: 'color', rgb: bg.rgb };
  }
}

function resolveStyle(jobDir: string, manifest: JobManifest): Readonly<StyleConfig> {
  const s: NonNullable<JobManifest['style']> = manifest.style ?? {};
  return {
    fontFamily:    s.fontFamily ?? DEFAULT_STYLE.fontFamily,
    fontPath:      s.fontPath ? path.resolve(jobDir, s.fontPath) : DEFAULT_STYLE.fontPath,
    fontSize:      s.fontSize ?? DEFAULT_STYLE.fontSize,
    fillColor:     s.fillColor ?? DEFAULT_STYLE.fillColor,
    outlineColor:  s.outlineColor ?? DEFAULT_STYLE.outlineColor,
    outlineWidth:  s.outlineWidth ?? DEFAULT_STYLE.outlineWidth,
    marginBottom:  s.marginBottom ?? DEFAULT_STYLE.marginBottom,
    alignment:     s.alignment ?? DEFAULT_STYLE.alignment,
    highlightMode: s.highlightMode ?? DEFAULT_STYLE.highlightMode,
    bitmapHeight:  s.bitmapHeight ?? DEFAULT_STYLE.bitmapHeight,
    lineSpacing:   s.lineSpacing ?? DEFAULT_STYLE.lineSpacing,
  };
}

export interface JobContext {
  settings: RenderSettings;
  probe: Prober;
}

export async function buildRequest(jobDir: string, manifest: JobManifest, ctx: JobContext): Promise<AssemblyRequest> {
  const audioPath = path.resolve(jobDir, manifest.audio);
  const subtitlesPath = path.resolve(jobDir, manifest.subtitles);

  let content: string;
  try {
    content = await fs.promises.readFile(subtitlesPath, 'utf-8');
  } catch (err) {
    throw new JobManifestError(`subtitles file "${subtitlesPath}" could not be read`, err);
  }
  const parsedCues = parseSrt(content);
  const cues = manifest.words ? attachWords(parsedCues, manifest.words) : parsedCues;

  let audioDuration = manifest.audioDuration;
  if (audioDuration === undefined) {
    try {
      audioDuration = (await ctx.probe(audioPath)).durationSeconds;
    } catch (err) {
      throw new JobManifestError(`audio "${audioPath}" could not be probed for its duration`, err);
    }
  }

  const estimatedDuration = manifest.estimatedDuration === 'last-cue'
    ? inferEstimatedDuration(cues)
    : manifest.estimatedDuration;

  return {
    jobId: manifest.id ?? path.basename(path.resolve(jobDir)),
    audioPath,
    audioDuration,
    estimatedDuration,
    background: resolveBackground(jobDir, manifest, ctx.settings),
    cues,
    style: resolveStyle(jobDir, manifest),
    outputPath: path.resolve(jobDir, manifest.output ?? DEFAULT_OUTPUT_FILE),
  };
}

// ── Loading ───────────────────────────────────────────────────────────────────

function referencedFiles(jobDir: string, manifest: JobManifest): string[] {
  const files = [manifest.audio, manifest.subtitles];
  if (manifest.background && manifest.background.type !== 'color') files.push(manifest.background.path);
  return files.map(f => path.resolve(jobDir, f));
}

/** Wait until job.json and every input it references exist. */
export async function waitForJob(jobDir: string, opts: { intervalMs: number; timeoutMs: number }): Promise<JobManifest> {
  return pollUntil(async () => {
    if (!fs.existsSync(path.join(jobDir, MANIFEST_FILE))) return undefined;
    const manifest = await readManifest(jobDir);
    return referencedFiles(jobDir, manifest).every(f => fs.existsSync(f)) ? manifest : undefined;
  }, { ...opts, label: `job ${path.basename(jobDir)}` });
}

export async function loadJob(
  jobDir: string,
  ctx: JobContext & { waitForInputs?: { intervalMs: number; timeoutMs: number } },
): Promise<AssemblyRequest> {
  const manifest = ctx.waitForInputs
    ? await waitForJob(jobDir, ctx.waitForInputs)
    : await readManifest(jobDir);
  logger.info('Job: loaded manifest', { jobDir, background: manifest.background?.type ?? 'none' });
  return buildRequest(jobDir, manifest, ctx);
}

// ── Discovery & status ────────────────────────────────────────────────────────

/** Immediate subdirectories of rootDir that contain a job.json, sorted by name. */
export function findJobDirs(rootDir: string): string[] {
  if (!fs.existsSync(rootDir)) return [];
  return fs.readdirSync(rootDir, { withFileTypes: true })
    .filter(d => d.isDirectory() && fs.existsSync(path.join(rootDir, d.name, MANIFEST_FILE)))
    .map(d => path.join(rootDir, d.name))
    .sort();
}

export function writeStatus(jobDir: string, progress: Readonly<JobProgress>): void {
  fs.writeFileSync(path.join(jobDir, STATUS_FILE), JSON.stringify(progress, null, 2) + '\n', 'utf-8');
}

export function readStatus(jobDir: string): JobProgress | undefined {
  const file = path.join(jobDir, STATUS_FILE);
  if (!fs.existsSync(file)) return undefined;
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    logger.warn('Job: unreadable status file', { file, err });
    return undefined;
  }
  const parsed = JobProgressSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/** Job directories in the inbox with no finished status yet. */
export function findPendingJobs(inbox: string): string[] {
  return findJobDirs(inbox).filter((dir) => {
    const status = readStatus(dir);
    return !status || (status.stage !== 'Done' && status.stage !== 'Failed');
  });
}
