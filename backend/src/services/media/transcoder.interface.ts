/**
 * Media Transcoder Interface
 *
 * The pipeline only needs two things from a transcoder: "run this command
 * description, tell me whether it worked" and "how long are the video and
 * audio streams of this file". Any engine that can do that is substitutable.
 */

export interface TranscodeInput {
  /** File path, or a lavfi source description when options include `-f lavfi` */
  source: string;
  /** Options placed before this input (e.g. `-ss`, `-f lavfi`) */
  options?: string[];
}

export interface TranscodeCommand {
  /** Short name used in logs, e.g. "segment-3" or "transition-1" */
  label: string;
  inputs: TranscodeInput[];
  filterComplex?: string;
  outputOptions: string[];
  outputPath: string;
}

export type TranscodeResult =
  | { ok: true }
  | {
      ok: false;
      message: string;
      stderr: string;
      /** True when the failure is environmental (spawn failure, disk full) rather than about the media */
      resource: boolean;
    };

export interface StreamDurations {
  /** Seconds; 0 when the file has no video stream */
  video: number;
  /** Seconds; 0 when the file has no audio stream */
  audio: number;
  /** Container duration in seconds */
  format: number;
}

export interface MediaTranscoder {
  run(command: TranscodeCommand): Promise<TranscodeResult>;
  probe(filePath: string): Promise<StreamDurations>;
}

const RESOURCE_PATTERNS = [/ENOENT/, /Cannot find ffmpeg/i, /spawn/i, /No space left on device/i, /ENOSPC/, /EMFILE/];

export function isResourceFailure(message: string, stderr = ''): boolean {
  return RESOURCE_PATTERNS.some((p) => p.test(message) || p.test(stderr));
}

/** The usable length of a clip: the shorter stream when both exist. */
export function playableDuration(d: StreamDurations): number {
  if (d.video > 0 && d.audio > 0) return Math.min(d.video, d.audio);
  const longest = Math.max(d.video, d.audio);
  return longest > 0 ? longest : d.format;
}
