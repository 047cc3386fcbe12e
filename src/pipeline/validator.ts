/**
 * Checks a produced file against short-form platform limits. A failed check
 * is reported in the returned issues, never thrown.
 */
import * as fs from 'fs';
import { PLATFORM_LIMITS, type PlatformLimits } from '../config.js';
import { logger } from '../utils/logger.js';
import type { Prober } from '../media/probe.js';
import type { MediaProbe, ValidationReport } from '../types.js';

const MIB = 1024 * 1024;

const mb = (bytes: number) => Number((bytes / MIB).toFixed(1));

export function evaluateProbe(probe: MediaProbe, limits: Readonly<PlatformLimits> = PLATFORM_LIMITS): ValidationReport {
  const issues: string[] = [];

  if (probe.width !== limits.width || probe.height !== limits.height) {
    issues.push(`Resolution ${probe.width}x${probe.height} does not match required ${limits.width}x${limits.height}`);
  }
  if (probe.durationSeconds < limits.minDurationSeconds) {
    issues.push(`Duration too short: ${probe.durationSeconds.toFixed(1)}s (min ${limits.minDurationSeconds}s)`);
  } else if (probe.durationSeconds > limits.maxDurationSeconds) {
    issues.push(`Duration too long: ${probe.durationSeconds.toFixed(1)}s (max ${limits.maxDurationSeconds}s)`);
  }
  if (probe.sizeBytes > limits.maxSizeBytes) {
    issues.push(`File too large: ${mb(probe.sizeBytes)}MB (max ${mb(limits.maxSizeBytes)}MB)`);
  }
  if (limits.requireAudio && !probe.hasAudioStream) {
    issues.push('No audio stream present');
  }

  return { passed: issues.length === 0, issues };
}

export async function validateOutput(
  filePath: string,
  probe: Prober,
  limits: Readonly<PlatformLimits> = PLATFORM_LIMITS,
): Promise<ValidationReport> {
  if (!fs.existsSync(filePath)) {
    return { passed: false, issues: [`Output file not found: ${filePath}`] };
  }

  let info: MediaProbe;
  try {
    info = await probe(filePath);
  } catch (err) {
    logger.warn('Validator: probe failed', { filePath, err });
    return { passed: false, issues: [`Output could not be probed: ${err instanceof Error ? err.message : String(err)}`] };
  }

  const report = evaluateProbe(info, limits);
  logger.info('Validator: checked output', { filePath, passed: report.passed, issues: report.issues.length });
  return report;
}
