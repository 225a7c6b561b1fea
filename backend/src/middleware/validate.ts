import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { AppError } from './errorHandler';
import {
  COMMENTARY_FREQUENCIES,
  ENERGY_CURVES,
  MIX_STRATEGIES,
  TRANSITION_STYLES,
  VIDEO_QUALITIES,
  type AudioSegment,
  type CommentaryContext,
  type CommentaryFrequency,
  type EnergyCurve,
  type MixStrategy,
  type PopularitySample,
  type SequencerItem,
  type TransitionStyle,
  type VideoQuality,
} from '../types/mix.types';

export const validate = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const errorMessage = error.details
        .map((detail) => detail.message)
        .join(', ');
      throw new AppError(errorMessage, 400);
    }

    // Replace request body with validated value
    req.body = value;
    next();
  };
};

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

/** Exactly one of `path` (media library file) and `sourceId` (fetched and cached) is set */
export interface AnalyzeBody {
  path?: string;
  sourceId?: string;
  durationSeconds?: number;
  popularity?: PopularitySample[];
  highlight: boolean;
  minSegmentSeconds?: number;
  maxSegmentSeconds?: number;
  maxSegments?: number;
  minGapSeconds?: number;
}

export interface SequenceBody {
  items: SequencerItem[];
  strategy: MixStrategy;
  energyCurve: EnergyCurve;
  maxSameLanguage: number;
  seed?: number;
}

export interface SuggestNextBody {
  current: SequencerItem;
  candidates: SequencerItem[];
  recentLanguages: string[];
  limit: number;
}

export interface CreateExportBody {
  name: string;
  entries: SequencerItem[];
  options: {
    transition?: TransitionStyle | 'random';
    transitionDuration?: number;
    textOverlay: boolean;
    quality?: VideoQuality;
    intro: boolean;
    outro: boolean;
    introTitle?: string;
    outroMessage?: string;
    commentary?: {
      enabled: boolean;
      voice?: string;
      frequency?: CommentaryFrequency;
      context?: CommentaryContext;
    };
  };
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

// duration is always derived from the window
const segment = Joi.object({
  startTime: Joi.number().min(0).required(),
  endTime: Joi.number().greater(Joi.ref('startTime')).required(),
  energyScore: Joi.number().min(0).max(100).default(50),
  isPrimary: Joi.boolean().default(true),
  label: Joi.string().max(64).default('segment'),
}).custom((value: Omit<AudioSegment, 'duration'>): AudioSegment => ({
  ...value,
  duration: Math.round((value.endTime - value.startTime) * 100) / 100,
}));

const track = Joi.object({
  tempoBpm: Joi.number().positive().allow(null).default(null),
  energyScore: Joi.number().min(0).max(100).default(50),
  language: Joi.string().trim().lowercase().max(32).default('unknown'),
  title: Joi.string().min(1).max(255).required(),
  artist: Joi.string().max(255).allow('').default(''),
  sourceDuration: Joi.number().min(0).default(0),
});

const sequencerItem = Joi.object({
  id: Joi.string().min(1).max(128).required(),
  sourceId: Joi.string().min(1).max(512).required(),
  segment: segment.required(),
  track: track.required(),
});

const items = Joi.array().items(sequencerItem).unique('id').max(200);

const popularitySample = Joi.object({
  startTime: Joi.number().min(0).required(),
  endTime: Joi.number().min(Joi.ref('startTime')).required(),
  value: Joi.number().min(0).max(1).required(),
});

export const schemas = {
  analyze: Joi.object<AnalyzeBody>({
    path: Joi.string().min(1),
    sourceId: Joi.string().trim().min(1),
    durationSeconds: Joi.number().positive().optional(),
    popularity: Joi.array().items(popularitySample).optional(),
    highlight: Joi.boolean().default(true),
    minSegmentSeconds: Joi.number().positive().optional(),
    maxSegmentSeconds: Joi.number().positive().optional(),
    maxSegments: Joi.number().integer().min(1).max(10).optional(),
    minGapSeconds: Joi.number().min(0).optional(),
  }).xor('path', 'sourceId'),

  sequence: Joi.object<SequenceBody>({
    items: items.required(),
    strategy: Joi.string().valid(...MIX_STRATEGIES).default('balanced'),
    energyCurve: Joi.string().valid(...ENERGY_CURVES).default('peak_middle'),
    maxSameLanguage: Joi.number().integer().min(1).default(2),
    seed: Joi.number().integer().optional(),
  }),

  suggestNext: Joi.object<SuggestNextBody>({
    current: sequencerItem.required(),
    candidates: items.required(),
    recentLanguages: Joi.array().items(Joi.string().trim().lowercase()).default([]),
    limit: Joi.number().integer().min(1).max(50).default(5),
  }),

  createExport: Joi.object<CreateExportBody>({
    name: Joi.string().trim().min(1).max(120).required(),
    entries: items.min(2).required(),
    options: Joi.object({
      transition: Joi.string().valid(...TRANSITION_STYLES, 'random').optional(),
      transitionDuration: Joi.number().min(0).max(10).optional(),
      textOverlay: Joi.boolean().default(true),
      quality: Joi.string().valid(...VIDEO_QUALITIES).optional(),
      intro: Joi.boolean().default(true),
      outro: Joi.boolean().default(true),
      introTitle: Joi.string().trim().max(80).optional(),
      outroMessage: Joi.string().trim().max(120).optional(),
      commentary: Joi.object({
        enabled: Joi.boolean().default(false),
        voice: Joi.string().max(64).optional(),
        frequency: Joi.string().valid(...COMMENTARY_FREQUENCIES).optional(),
        context: Joi.object({
          theme: Joi.string().max(64).optional(),
          audience: Joi.string().max(64).optional(),
          shoutouts: Joi.array().items(Joi.string().max(64)).max(10).optional(),
        }).optional(),
      }).optional(),
    }).default(),
  }),
};
