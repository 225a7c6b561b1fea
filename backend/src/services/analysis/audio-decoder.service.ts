import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import { logger } from '../../config/logger';

export interface AudioDecoder {
  /** Decode the first audio stream to mono 32-bit float PCM at `sampleRate`. */
  decode(filePath: string, sampleRate: number): Promise<Float32Array>;
}

function toFloat32(chunks: Buffer[]): Float32Array {
  const total = chunks.reduce((n, c) => n + c.length, 0);
  const usable = total - (total % 4);
  // copy into a fresh, aligned buffer; Buffer pools do not guarantee 4-byte alignment
  const bytes = new Uint8Array(usable);
  let offset = 0;
  for (const chunk of chunks) {
    const take = Math.min(chunk.length, usable - offset);
    if (take <= 0) break;
    bytes.set(chunk.subarray(0, take), offset);
    offset += take;
  }
  return new Float32Array(bytes.buffer);
}

class FfmpegAudioDecoder implements AudioDecoder {
  async decode(filePath: string, sampleRate: number): Promise<Float32Array> {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Audio file not found: ${filePath}`);
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let failed = false;

      const command = ffmpeg(filePath)
        .noVideo()
        .audioChannels(1)
        .audioFrequency(sampleRate)
        .format('f32le')
        .on('start', (commandLine: string) => {
          logger.debug('FFmpeg decode started: %s', commandLine.substring(0, 300));
        })
        .on('error', (err: Error) => {
          failed = true;
          reject(new Error(`FFmpeg decode failed: ${err.message}`));
        })
        .on('end', () => {
          if (failed) return;
          const signal = toFloat32(chunks);
          if (signal.length === 0) {
            reject(new Error('Decoded audio is empty'));
            return;
          }
          resolve(signal);
        });

      const stream = command.pipe();
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    });
  }
}

export { FfmpegAudioDecoder };
export default new FfmpegAudioDecoder();
