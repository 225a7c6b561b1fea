import { Request, Response } from 'express';
import fs from 'fs';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import type { AnalyzeBody } from '../middleware/validate';
import { round } from '../services/analysis/dsp';
import { selectSegmentForTrack } from '../services/analysis/segment-aligner.service';
import type { MixEngine } from '../services/mix-engine';
import { resolveLibraryPath } from '../services/sources/local-library.fetcher';
import type { PopularitySample } from '../types/mix.types';

interface AnalysisTarget {
  filePath: string;
  label: string;
  /** Nominal duration reported by the fetcher; 0 when unknown */
  durationSeconds: number;
  popularity?: PopularitySample[];
}

export const createAnalysisController = ({ settings, analyzer, sources }: Pick<MixEngine, 'settings' | 'analyzer' | 'sources'>) => {
  const resolveTarget = async (body: AnalyzeBody): Promise<AnalysisTarget> => {
    if (body.sourceId !== undefined) {
      const fetched = await sources.get(body.sourceId);
      return {
        filePath: fetched.path,
        label: body.sourceId,
        durationSeconds: fetched.durationSeconds,
        ...(fetched.popularity ? { popularity: fetched.popularity } : {}),
      };
    }

    const relative = body.path ?? '';
    const filePath = resolveLibraryPath(settings.paths.libraryDir, relative);
    if (!fs.existsSync(filePath)) {
      throw new AppError(`File not found in media library: ${relative}`, 404);
    }
    return { filePath, label: relative, durationSeconds: 0 };
  };

  return {
    /**
     * Analyze a library file or a fetched source: tempo, energy curve, peak
     * segments, and the aligned highlight window. A fetched source's popularity
     * curve feeds the highlight choice unless the request brings its own.
     */
    analyze: asyncHandler(async (req: Request, res: Response) => {
      const body: AnalyzeBody = req.body;
      const target = await resolveTarget(body);

      const analysis = await analyzer.analyzeFile(target.filePath, {
        trackLabel: target.label,
        minSegmentSeconds: body.minSegmentSeconds,
        maxSegmentSeconds: body.maxSegmentSeconds,
        maxSegments: body.maxSegments,
        minGapSeconds: body.minGapSeconds,
      });

      const trackDuration =
        body.durationSeconds ?? (target.durationSeconds || analysis.energyCurve.length / analysis.framesPerSecond);
      const highlight = body.highlight
        ? selectSegmentForTrack(analysis, trackDuration, body.popularity ?? target.popularity, settings.alignment)
        : undefined;

      res.json({
        success: true,
        data: {
          tempoBpm: analysis.tempoBpm,
          overallEnergy: analysis.overallEnergy,
          segments: analysis.segments,
          beatTimes: analysis.beatTimes.map((t) => round(t, 3)),
          framesPerSecond: analysis.framesPerSecond,
          energyCurve: Array.from(analysis.energyCurve, (v) => round(v, 4)),
          ...(highlight ? { highlight } : {}),
        },
      });
    }),
  };
};
