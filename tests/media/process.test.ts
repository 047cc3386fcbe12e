import { describe, it, expect } from 'vitest';
import { diagnosticTail, runExternalEncoder, type ProcessRunner } from '../../src/media/process.js';
import { EncodingFailedError } from '../../src/errors.js';

describe('diagnosticTail', () => {
  it('keeps short output whole', () => {
    expect(diagnosticTail('error line')).toBe('error line');
  });

  it('keeps only the end of long output', () => {
    const long = 'x'.repeat(5_000) + 'END';
    const tail = diagnosticTail(long);
    expect(tail).toHaveLength(4_000);
    expect(tail.endsWith('END')).toBe(true);
  });
});

describe('runExternalEncoder', () => {
  it('resolves with the process outcome on exit 0', async () => {
    const runner: ProcessRunner = async () => ({ exitCode: 0, stdout: 'ok', stderr: '' });
    await expect(runExternalEncoder(['-i', 'in.mp4', 'out.mp4'], { ffmpegPath: 'ffmpeg', runner, label: 'test' }))
      .resolves.toEqual({ exitCode: 0, stdout: 'ok', stderr: '' });
  });

  it('keeps the diagnostics of a failed run', async () => {
    const runner: ProcessRunner = async () => ({ exitCode: 234, stdout: '', stderr: 'Conversion failed!' });
    const err = await runExternalEncoder([], { ffmpegPath: 'ffmpeg', runner, label: 'test' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EncodingFailedError);
    expect(err instanceof EncodingFailedError && err.diagnostics).toBe('Conversion failed!');
  });
});
