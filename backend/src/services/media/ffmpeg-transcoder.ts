import ffmpeg from 'fluent-ffmpeg';
import { z } from 'zod';
import { logger } from '../../config/logger';
import {
  isResourceFailure,
  type MediaTranscoder,
  type StreamDurations,
  type TranscodeCommand,
  type TranscodeResult,
} from './transcoder.interface';

// ─── ffprobe output schema ───────────────────────────────────────────────────

const probeDuration = z.preprocess(
  (v) => (v === undefined || v === null || v === 'N/A' ? undefined : Number(v)),
  z.number().finite().nonnegative().optional()
);

const probeSchema = z.object({
  streams: z.array(
    z.object({
      codec_type: z.string().optional(),
      duration: probeDuration,
    })
  ),
  format: z.object({ duration: probeDuration }).passthrough(),
});

const STDERR_TAIL = 1500;

/**
 * fluent-ffmpeg backed transcoder. Commands are run as described; every
 * failure is returned as a value, never thrown.
 */
class FfmpegTranscoder implements MediaTranscoder {
  async run(command: TranscodeCommand): Promise<TranscodeResult> {
    return new Promise((resolve) => {
      const cmd = ffmpeg();

      for (const input of command.inputs) {
        cmd.input(input.source);
        if (input.options && input.options.length > 0) cmd.inputOptions(input.options);
      }
      if (command.filterComplex) {
        cmd.complexFilter(command.filterComplex);
      }

      cmd
        .outputOptions(command.outputOptions)
        .output(command.outputPath)
        .on('start', (commandLine: string) => {
          logger.debug('FFmpeg command started', { label: command.label });
          logger.debug('FFmpeg command (first 500 chars): %s', commandLine.substring(0, 500));
        })
        .on('end', () => {
          logger.debug('FFmpeg command finished', { label: command.label, output: command.outputPath });
          resolve({ ok: true });
        })
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          const tail = (stderr ?? '').slice(-STDERR_TAIL);
          logger.warn('FFmpeg command failed', { label: command.label, error: err.message });
          resolve({
            ok: false,
            message: err.message,
            stderr: tail,
            resource: isResourceFailure(err.message, tail),
          });
        });

      cmd.run();
    });
  }

  async probe(filePath: string): Promise<StreamDurations> {
    const raw = await new Promise<unknown>((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err: Error | null, metadata: unknown) => {
        if (err) {
          reject(new Error(`ffprobe failed for "${filePath}": ${err.message}`));
        } else {
          resolve(metadata);
        }
      });
    });

    const parsed = probeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`ffprobe output has unexpected shape for "${filePath}": ${parsed.error.message}`);
    }

    const { streams, format } = parsed.data;
    const video = streams.find((s) => s.codec_type === 'video')?.duration ?? 0;
    const audio = streams.find((s) => s.codec_type === 'audio')?.duration ?? 0;
    return { video, audio, format: format.duration ?? Math.max(video, audio) };
  }
}

export { FfmpegTranscoder };
export default new FfmpegTranscoder();
