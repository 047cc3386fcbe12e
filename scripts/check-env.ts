#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for the shorts assembler.
 * Checks ffmpeg/ffprobe, the subtitle font, the canvas renderer and the
 * working directories.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { accessSync, constants, existsSync, mkdirSync } from 'fs';
import { spawnSync } from 'child_process';
import { GlobalFonts } from '@napi-rs/canvas';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

let anyRequiredFailed = false;

// ── Section: External tools ───────────────────────────────────────────────────

console.log(`\n${BOLD}=== Shorts Assembler — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] External tools${RESET}`);

function checkBinary(label: string, binary: string): void {
  const probe = spawnSync(binary, ['-version'], { encoding: 'utf-8' });
  if (probe.error || probe.status !== 0) {
    fail(label, `"${binary}" did not run; install it or set ${label}`);
    anyRequiredFailed = true;
    return;
  }
  pass(label, probe.stdout.split('\n')[0] ?? binary);
}

checkBinary('FFMPEG_PATH',  process.env['FFMPEG_PATH']  ?? 'ffmpeg');
checkBinary('FFPROBE_PATH', process.env['FFPROBE_PATH'] ?? 'ffprobe');

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Configuration variables${RESET}`);

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value ?? defaultVal;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

checkOptional('OUTPUT_WIDTH',         process.env['OUTPUT_WIDTH'],         '1080');
checkOptional('OUTPUT_HEIGHT',        process.env['OUTPUT_HEIGHT'],        '1920');
checkOptional('OUTPUT_FPS',           process.env['OUTPUT_FPS'],           '30');
checkOptional('AUDIO_BITRATE',        process.env['AUDIO_BITRATE'],        '128k');
checkOptional('FALLBACK_COLOR',       process.env['FALLBACK_COLOR'],       '#141428');
checkOptional('SUBTITLE_FONT_FAMILY', process.env['SUBTITLE_FONT_FAMILY'], 'Arial');
checkOptional('SERVE_SCHEDULE',       process.env['SERVE_SCHEDULE'],       '* * * * *');
checkOptional('LOG_LEVEL',            process.env['LOG_LEVEL'],            'info');

// ── Section: Subtitle font ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Subtitle font${RESET}`);

const fontFamily = process.env['SUBTITLE_FONT_FAMILY'] ?? 'Arial';
const fontPath   = process.env['SUBTITLE_FONT_PATH'];

if (fontPath) {
  if (!existsSync(fontPath)) {
    fail('SUBTITLE_FONT_PATH', `File not found: ${fontPath}`);
    anyRequiredFailed = true;
  } else if (GlobalFonts.registerFromPath(fontPath, fontFamily)) {
    pass('SUBTITLE_FONT_PATH', `${fontPath} registered as "${fontFamily}"`);
  } else {
    fail('SUBTITLE_FONT_PATH', 'File exists but could not be loaded as a font');
    anyRequiredFailed = true;
  }
} else if (GlobalFonts.has(fontFamily)) {
  pass(`System font "${fontFamily}"`);
} else {
  // Rendering still works with the built-in fallback family.
  console.log(`  ${YELLOW}○${RESET} System font "${fontFamily}"  (not installed — subtitles will use sans-serif)`);
}

// ── Section: Directories ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Working directories${RESET}`);

function checkWritableDir(label: string, dirPath: string): void {
  try {
    mkdirSync(dirPath, { recursive: true });
    accessSync(dirPath, constants.W_OK);
    pass(label, dirPath);
  } catch (err) {
    fail(label, `${dirPath} is not writable: ${err instanceof Error ? err.message : String(err)}`);
    anyRequiredFailed = true;
  }
}

checkWritableDir('TEMP_DIR',   process.env['TEMP_DIR']   ?? '/tmp/shorts-assembler');
checkWritableDir('JOBS_INBOX', process.env['JOBS_INBOX'] ?? './jobs');

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run assemble -- <jobDir>${RESET}\n`);
}
