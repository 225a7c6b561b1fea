// ===========================================================================
// Mix Engine Types
//
// Shared shapes flowing between the analyzer, the sequencer and the
// composition pipeline:
//
//   Analyzer  ──AudioSegment──▶  Sequencer  ──MixPlan──▶  Pipeline
//                                                   │
//                                                   └──▶ CompositionJob (status)
// ===========================================================================

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

/** A time window inside a source track chosen for inclusion in the mix. */
export interface AudioSegment {
  /** Seconds from the start of the source track */
  startTime: number;
  endTime: number;
  /** Always endTime - startTime */
  duration: number;
  /** Mean composite energy of the window, 0-100 */
  energyScore: number;
  /** True for the single highest-energy segment of a track */
  isPrimary: boolean;
  label: string;
}

/** Replay-intensity sample from an external popularity curve ("most replayed"). */
export interface PopularitySample {
  startTime: number;
  endTime: number;
  /** Normalised intensity 0-1 */
  value: number;
}

export interface AnalysisResult {
  tempoBpm: number;
  /** Mean of the energy curve, 0-100 */
  overallEnergy: number;
  segments: AudioSegment[];
  /** Detected beat positions in seconds (empty when beat tracking failed) */
  beatTimes: number[];
  /** Composite energy per analysis frame, 0-1 */
  energyCurve: Float64Array;
  /** Analysis frames per second (sampleRate / hopLength) */
  framesPerSecond: number;
}

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

/** Read-only reference data about a song, supplied by the catalog layer. */
export interface TrackMetadata {
  tempoBpm: number | null;
  /** 0-100 */
  energyScore: number;
  language: string;
  title: string;
  artist: string;
  /** Seconds */
  sourceDuration: number;
}

/** One candidate cut: a segment plus the song it was cut from. */
export interface SequencerItem {
  id: string;
  /** Identifier handed to the source fetcher (e.g. a video id or library file name) */
  sourceId: string;
  segment: AudioSegment;
  track: TrackMetadata;
}

export const MIX_STRATEGIES = ['tempo_smooth', 'language_variety', 'energy_curve', 'balanced'] as const;
export type MixStrategy = (typeof MIX_STRATEGIES)[number];

export const ENERGY_CURVES = ['peak_middle', 'ascending', 'descending', 'wave'] as const;
export type EnergyCurve = (typeof ENERGY_CURVES)[number];

export interface TransitionRecord {
  from: string;
  to: string;
  tempoDelta: number;
  energyDelta: number;
  sameLanguage: boolean;
  /** 0-100 */
  smoothnessScore: number;
}

export interface MixPlan {
  entries: SequencerItem[];
  transitions: TransitionRecord[];
  /** 0-100 */
  qualityScore: number;
  strategy: MixStrategy;
  energyCurve: EnergyCurve;
  notes: string[];
}

export interface SequenceOptions {
  strategy?: MixStrategy;
  energyCurve?: EnergyCurve;
  maxSameLanguage?: number;
  /** Seed for the tier shuffles of the peak_middle curve */
  seed?: number;
}

export interface NextSuggestion {
  item: SequencerItem;
  score: number;
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export const JOB_STATUSES = [
  'pending',
  'downloading',
  'processing',
  'concatenating',
  'encoding',
  'complete',
  'failed',
  'cancelled',
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface JobError {
  stage: string;
  message: string;
}

/** Status record of one export. Snapshots of this are what observers see. */
export interface CompositionJob {
  id: string;
  status: JobStatus;
  /** 0-100 */
  progress: number;
  currentStage: string;
  segmentIndex: number;
  totalSegments: number;
  error?: JobError;
  outputPath?: string;
  durationSeconds?: number;
  fileSizeBytes?: number;
  /** Non-fatal problems (skipped segments, dropped commentary, ...) */
  warnings: string[];
  createdAt: string;
  updatedAt: string;
}

/** Event pushed to job observers on every update. */
export interface ProgressEvent {
  jobId: string;
  status: JobStatus;
  progress: number;
  currentStage: string;
  segmentIndex: number;
  totalSegments: number;
  error?: JobError;
}

export const COMMENTARY_KINDS = ['intro', 'mid', 'outro', 'transition', 'peak', 'energy'] as const;
export type CommentaryKind = (typeof COMMENTARY_KINDS)[number];

/** A spoken insertion anchored to the final timeline. */
export interface CommentaryCue {
  text: string;
  kind: CommentaryKind;
  /** Seconds from the start of the final artifact */
  scheduledTime: number;
  /** Seconds; 0 until the voice clip has been rendered */
  clipDuration: number;
  clipPath?: string;
}

export const COMMENTARY_FREQUENCIES = ['minimal', 'moderate', 'frequent'] as const;
export type CommentaryFrequency = (typeof COMMENTARY_FREQUENCIES)[number];

export interface CommentaryContext {
  theme?: string;
  audience?: string;
  shoutouts?: string[];
}

export const TRANSITION_STYLES = [
  'fade',
  'dissolve',
  'fadeblack',
  'fadewhite',
  'circlecrop',
  'circleopen',
  'radial',
  'wipeleft',
  'wiperight',
  'smoothleft',
  'smoothright',
] as const;
export type TransitionStyle = (typeof TRANSITION_STYLES)[number];

export const VIDEO_QUALITIES = ['480p', '720p', '1080p'] as const;
export type VideoQuality = (typeof VIDEO_QUALITIES)[number];

export interface ExportOptions {
  transition: TransitionStyle | 'random';
  transitionDuration: number;
  textOverlay: boolean;
  quality: VideoQuality;
  intro: boolean;
  outro: boolean;
  introTitle: string;
  outroMessage: string;
  commentary?: {
    enabled: boolean;
    voice: string;
    frequency: CommentaryFrequency;
    context?: CommentaryContext;
  };
}

export interface MixExportRequest {
  name: string;
  entries: SequencerItem[];
  options: ExportOptions;
}

export interface CompositionResult {
  outputPath: string;
  durationSeconds: number;
  fileSizeBytes: number;
  segmentsUsed: number;
  commentaryCues: CommentaryCue[];
}
