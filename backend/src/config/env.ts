import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import { TRANSITION_STYLES, VIDEO_QUALITIES, COMMENTARY_FREQUENCIES } from '../types/mix.types';
import type { VideoQuality } from '../types/mix.types';

/**
 * Load .env from backend directory or repo root so env vars are available
 * whether the service is started from backend/ or from the workspace root.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [path.join(cwd, '.env'), path.join(cwd, '..', '.env')];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error && process.env.NODE_ENV === 'development') {
        console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
      }
      return;
    }
  }
}

// ── Env schema ──────────────────────────────────────────────────────────────
// Every knob has a default so an empty environment yields a working config.

const EnvSchema = z.object({
  CLIPMIX_HOME: z.string().default(path.join(process.cwd(), 'clipmix-data')),
  MEDIA_LIBRARY_DIR: z.string().default(path.join(process.cwd(), 'media')),

  // Analysis
  SEGMENT_MIN_SECONDS: z.coerce.number().positive().default(30),
  SEGMENT_MAX_SECONDS: z.coerce.number().positive().default(45),
  SEGMENTS_PER_TRACK: z.coerce.number().int().positive().default(2),
  SEGMENT_MIN_GAP_SECONDS: z.coerce.number().min(0).default(20),
  ANALYSIS_SAMPLE_RATE: z.coerce.number().int().positive().default(22050),
  ALIGN_MIN_DURATION: z.coerce.number().min(0).default(40),

  // Composition
  TRANSITION_STYLE: z.enum([...TRANSITION_STYLES, 'random']).default('random'),
  TRANSITION_DURATION: z.coerce.number().min(0).default(3.5),
  TRANSITION_MIN_DURATION: z.coerce.number().min(0).default(1.0),
  VIDEO_QUALITY: z.enum(VIDEO_QUALITIES).default('720p'),

  // Commentary
  COMMENTARY_FREQUENCY: z.enum(COMMENTARY_FREQUENCIES).default('moderate'),
  COMMENTARY_DUCK_LEVEL: z.coerce.number().min(0).max(1).default(0.2),
  COMMENTARY_VOICE_BOOST: z.coerce.number().positive().default(2.5),
  VOICE_API_URL: z.string().optional(),
  VOICE_API_KEY: z.string().optional(),
  VOICE_COMMAND: z.string().optional(),

  // Fetching
  SOURCE_FETCHER: z.enum(['library', 'yt-dlp']).default('library'),
  YTDLP_PATH: z.string().default('yt-dlp'),

  // Queue
  MIX_QUEUE_MODE: z.enum(['queue', 'inline']).default('queue'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  MIX_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  JOB_RETENTION_MINUTES: z.coerce.number().positive().default(60),
  JOB_RETENTION_MAX: z.coerce.number().int().min(0).default(200),

  // HTTP
  PORT: z.coerce.number().int().positive().default(5000),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

// ── Settings ────────────────────────────────────────────────────────────────

export const RESOLUTIONS: Record<VideoQuality, { width: number; height: number }> = {
  '480p': { width: 854, height: 480 },
  '720p': { width: 1280, height: 720 },
  '1080p': { width: 1920, height: 1080 },
};

export interface AnalysisSettings {
  sampleRate: number;
  hopLength: number;
  frameLength: number;
  /** Upper bound on the smoothing kernel, in frames */
  maxSmoothingKernel: number;
  minSegmentSeconds: number;
  maxSegmentSeconds: number;
  maxSegments: number;
  minGapSeconds: number;
  fallbackTempo: number;
}

export interface AlignmentSettings {
  /** Seconds searched either side of the target end for an RMS dip */
  phraseSearchRadius: number;
  /** A dip is "clean" when its RMS is below this fraction of the local mean */
  dipRatio: number;
  /** Aligned windows shorter than this are discarded in favour of the raw window */
  minAlignedDuration: number;
  /** Prefer the popular window when its energy reaches this share of the peak window */
  popularityEnergyShare: number;
  /** ...or when the popularity score alone exceeds this */
  popularityScoreThreshold: number;
}

export interface CompositionSettings {
  transitionStyle: (typeof TRANSITION_STYLES)[number] | 'random';
  transitionDuration: number;
  minTransitionDuration: number;
  /** A transition never exceeds this share of either clip */
  maxTransitionShare: number;
  quality: VideoQuality;
  fps: number;
  audioSampleRate: number;
  introDuration: number;
  outroDuration: number;
  introTitle: string;
  outroMessage: string;
  /** Stream-duration disagreement (s) above which a clip is re-cut before concat */
  syncTolerance: number;
}

export interface CommentarySettings {
  frequency: (typeof COMMENTARY_FREQUENCIES)[number];
  duckLevel: number;
  voiceBoost: number;
  defaultVoice: string;
  voiceApiUrl?: string;
  voiceApiKey?: string;
  voiceCommand?: string;
}

export interface MixSettings {
  paths: {
    home: string;
    workDir: string;
    cacheDir: string;
    exportsDir: string;
    libraryDir: string;
  };
  analysis: AnalysisSettings;
  alignment: AlignmentSettings;
  composition: CompositionSettings;
  commentary: CommentarySettings;
  fetcher: { kind: 'library' | 'yt-dlp'; ytDlpPath: string };
  queue: { mode: 'queue' | 'inline'; redisUrl: string; concurrency: number };
  /** How long finished jobs stay in the registry */
  jobs: { retentionMs: number; maxFinished: number };
  server: { port: number; corsOrigin: string };
}

/**
 * Build the engine configuration once from the environment. The returned value
 * is passed explicitly to every service; nothing else reads process.env for
 * mix behaviour.
 */
export function loadMixSettings(env: NodeJS.ProcessEnv = process.env): MixSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new Error(`Invalid environment variables: ${invalid}`);
  }
  const e = parsed.data;

  if (e.SEGMENT_MAX_SECONDS < e.SEGMENT_MIN_SECONDS) {
    throw new Error('SEGMENT_MAX_SECONDS must be >= SEGMENT_MIN_SECONDS');
  }

  return {
    paths: {
      home: e.CLIPMIX_HOME,
      workDir: path.join(e.CLIPMIX_HOME, 'work'),
      cacheDir: path.join(e.CLIPMIX_HOME, 'cache', 'video'),
      exportsDir: path.join(e.CLIPMIX_HOME, 'exports'),
      libraryDir: e.MEDIA_LIBRARY_DIR,
    },
    analysis: {
      sampleRate: e.ANALYSIS_SAMPLE_RATE,
      hopLength: 512,
      frameLength: 2048,
      maxSmoothingKernel: 21,
      minSegmentSeconds: e.SEGMENT_MIN_SECONDS,
      maxSegmentSeconds: e.SEGMENT_MAX_SECONDS,
      maxSegments: e.SEGMENTS_PER_TRACK,
      minGapSeconds: e.SEGMENT_MIN_GAP_SECONDS,
      fallbackTempo: 120,
    },
    alignment: {
      phraseSearchRadius: 4,
      dipRatio: 0.6,
      minAlignedDuration: e.ALIGN_MIN_DURATION,
      popularityEnergyShare: 0.5,
      popularityScoreThreshold: 0.7,
    },
    composition: {
      transitionStyle: e.TRANSITION_STYLE,
      transitionDuration: e.TRANSITION_DURATION,
      minTransitionDuration: e.TRANSITION_MIN_DURATION,
      maxTransitionShare: 0.4,
      quality: e.VIDEO_QUALITY,
      fps: 30,
      audioSampleRate: 44100,
      introDuration: 4,
      outroDuration: 3,
      introTitle: 'DJ MIX',
      outroMessage: 'Thanks for listening!',
      syncTolerance: 0.1,
    },
    commentary: {
      frequency: e.COMMENTARY_FREQUENCY,
      duckLevel: e.COMMENTARY_DUCK_LEVEL,
      voiceBoost: e.COMMENTARY_VOICE_BOOST,
      defaultVoice: 'energetic_male',
      voiceApiUrl: e.VOICE_API_URL || undefined,
      voiceApiKey: e.VOICE_API_KEY || undefined,
      voiceCommand: e.VOICE_COMMAND || undefined,
    },
    fetcher: { kind: e.SOURCE_FETCHER, ytDlpPath: e.YTDLP_PATH },
    queue: {
      mode: e.MIX_QUEUE_MODE,
      redisUrl: e.REDIS_URL,
      concurrency: e.MIX_WORKER_CONCURRENCY,
    },
    jobs: {
      retentionMs: e.JOB_RETENTION_MINUTES * 60 * 1000,
      maxFinished: e.JOB_RETENTION_MAX,
    },
    server: {
      port: e.PORT,
      corsOrigin: e.CORS_ORIGIN,
    },
  };
}
