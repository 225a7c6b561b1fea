import { Request, Response } from 'express';
import { errorMessage, logger } from '../config/logger';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import type { CreateExportBody, SequenceBody, SuggestNextBody } from '../middleware/validate';
import type { MixEngine } from '../services/mix-engine';
import { sequence, suggestNext } from '../services/mix/sequencer.service';
import type { ExportOptions, MixExportRequest } from '../types/mix.types';
import type { MixSettings } from '../config/env';

/**
 * Fill the options a client left out from the configured defaults.
 */
export function resolveExportOptions(input: CreateExportBody['options'], settings: MixSettings): ExportOptions {
  const c = settings.composition;
  const commentary = input.commentary;

  return {
    transition: input.transition ?? c.transitionStyle,
    transitionDuration: input.transitionDuration ?? c.transitionDuration,
    textOverlay: input.textOverlay,
    quality: input.quality ?? c.quality,
    intro: input.intro,
    outro: input.outro,
    introTitle: input.introTitle || c.introTitle,
    outroMessage: input.outroMessage || c.outroMessage,
    ...(commentary?.enabled
      ? {
          commentary: {
            enabled: true,
            voice: commentary.voice ?? settings.commentary.defaultVoice,
            frequency: commentary.frequency ?? settings.commentary.frequency,
            ...(commentary.context ? { context: commentary.context } : {}),
          },
        }
      : {}),
  };
}

export const createMixController = ({ settings, registry, dispatcher }: Pick<MixEngine, 'settings' | 'registry' | 'dispatcher'>) => ({
  /**
   * Order segments into a mix plan
   */
  sequence: asyncHandler(async (req: Request, res: Response) => {
    const { items, strategy, energyCurve, maxSameLanguage, seed }: SequenceBody = req.body;

    const plan = sequence(items, { strategy, energyCurve, maxSameLanguage, seed });

    res.json({
      success: true,
      data: plan,
    });
  }),

  /**
   * Rank candidates for the slot after the current segment
   */
  suggestNext: asyncHandler(async (req: Request, res: Response) => {
    const { current, candidates, recentLanguages, limit }: SuggestNextBody = req.body;

    res.json({
      success: true,
      data: suggestNext(current, candidates, recentLanguages).slice(0, limit),
    });
  }),

  /**
   * Start an export. Returns at once; the job is followed by id.
   */
  createExport: asyncHandler(async (req: Request, res: Response) => {
    const body: CreateExportBody = req.body;
    const request: MixExportRequest = {
      name: body.name,
      entries: body.entries,
      options: resolveExportOptions(body.options, settings),
    };

    const handle = registry.create(request.entries.length);
    try {
      await dispatcher.dispatch(handle, request);
    } catch (error) {
      logger.error('Failed to dispatch mix export', { jobId: handle.id, error: errorMessage(error) });
      handle.fail({ stage: 'pending', message: `Could not start export: ${errorMessage(error)}` });
      throw new AppError('Could not start export', 503);
    }

    res.status(202).json({
      success: true,
      message: 'Mix export started',
      data: registry.get(handle.id),
    });
  }),

  getExport: asyncHandler(async (req: Request, res: Response) => {
    const job = registry.get(req.params.id);
    if (!job) {
      throw new AppError('Export not found', 404);
    }

    res.json({
      success: true,
      data: job,
    });
  }),

  cancelExport: asyncHandler(async (req: Request, res: Response) => {
    const { id } = req.params;
    if (!registry.get(id)) {
      throw new AppError('Export not found', 404);
    }
    if (!registry.requestCancel(id)) {
      throw new AppError('Export has already finished', 409);
    }

    logger.info('Mix export cancellation requested', { jobId: id });
    res.status(202).json({
      success: true,
      message: 'Cancellation requested',
      data: registry.get(id),
    });
  }),
});
