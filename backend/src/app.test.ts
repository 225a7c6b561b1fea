import axios, { type AxiosInstance } from 'axios';
import fs from 'fs';
import type http from 'http';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { loadMixSettings, type MixSettings } from './config/env';
import type { AudioDecoder } from './services/analysis/audio-decoder.service';
import { VoiceManager } from './services/commentary/voice-manager.service';
import { createMixEngine, type MixEngine } from './services/mix-engine';
import type { FetchedSource, SourceFetcher } from './services/sources/source-fetcher.interface';
import { FakeTranscoder } from './test-support/fake-transcoder';
import type { AudioSegment, CompositionJob, MixPlan, NextSuggestion } from './types/mix.types';

interface ApiBody<T> {
  success: boolean;
  message?: string;
  stage?: string;
  data: T;
}

interface AnalysisBody {
  tempoBpm: number;
  segments: AudioSegment[];
  framesPerSecond: number;
  energyCurve: number[];
  highlight?: { segment: AudioSegment; choice: { source: string; startTime: number; popularityScore?: number } };
}

class GatedFetcher implements SourceFetcher {
  readonly name = 'gated';
  gated = false;
  /** Per-source metadata reported instead of the 180 s default */
  readonly catalog = new Map<string, Omit<FetchedSource, 'path'>>();
  private waiters: Array<() => void> = [];

  open(): void {
    this.gated = false;
    this.waiters.splice(0).forEach((release) => release());
  }

  async fetch(sourceId: string, destination: string): Promise<FetchedSource> {
    if (this.gated) await new Promise<void>((resolve) => this.waiters.push(resolve));
    await fs.promises.writeFile(destination, `source:${sourceId}`);
    return { path: destination, durationSeconds: 180, ...this.catalog.get(sourceId) };
  }
}

/** 20 s of a 440 Hz tone, quiet for the first half and loud for the second. */
class ToneDecoder implements AudioDecoder {
  async decode(filePath: string, sampleRate: number): Promise<Float32Array> {
    if (filePath.endsWith('broken.wav')) throw new Error('corrupt header');
    const signal = new Float32Array(sampleRate * 20);
    for (let i = 0; i < signal.length; i++) {
      const amplitude = i < sampleRate * 10 ? 0.1 : 0.8;
      signal[i] = amplitude * Math.sin((2 * Math.PI * 440 * i) / sampleRate);
    }
    return signal;
  }
}

const item = (id: string, energyScore: number, language: string, tempoBpm: number) => ({
  id,
  sourceId: `src-${id}`,
  segment: { startTime: 10, endTime: 40, energyScore },
  track: { tempoBpm, energyScore, language, title: `Song ${id}`, artist: 'Artist' },
});

describe('HTTP API', () => {
  let home: string;
  let settings: MixSettings;
  let fetcher: GatedFetcher;
  let engine: MixEngine;
  let server: http.Server;
  let client: AxiosInstance;

  beforeEach(async () => {
    home = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'api-'));
    settings = loadMixSettings({
      CLIPMIX_HOME: home,
      MEDIA_LIBRARY_DIR: path.join(home, 'media'),
      MIX_QUEUE_MODE: 'inline',
    });
    await fs.promises.mkdir(settings.paths.libraryDir, { recursive: true });

    const transcoder = new FakeTranscoder();
    fetcher = new GatedFetcher();
    engine = createMixEngine(settings, {
      transcoder,
      fetcher,
      decoder: new ToneDecoder(),
      voices: new VoiceManager([], transcoder),
    });

    const app = createApp(engine);
    server = await new Promise<http.Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await engine.dispatcher.close();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await fs.promises.rm(home, { recursive: true, force: true });
  });

  it('reports health', async () => {
    const res = await client.get<{ status: string }>('/health');

    expect(res.status).toBe(200);
    expect(res.data.status).toBe('ok');
  });

  describe('planning', () => {
    it('sequences items along an ascending energy curve', async () => {
      const res = await client.post<ApiBody<MixPlan>>('/api/mixes/sequence', {
        items: [item('x', 90, 'english', 120), item('y', 30, 'hindi', 122), item('z', 60, 'tamil', 118)],
        strategy: 'energy_curve',
        energyCurve: 'ascending',
      });

      expect(res.status).toBe(200);
      expect(res.data.data.entries.map((e) => e.id)).toEqual(['y', 'z', 'x']);
      expect(res.data.data.strategy).toBe('energy_curve');
      expect(res.data.data.entries[0].segment.duration).toBe(30);
    });

    it('rejects items missing required fields', async () => {
      const res = await client.post<ApiBody<unknown>>('/api/mixes/sequence', { items: [{ id: 'a' }] });

      expect(res.status).toBe(400);
      expect(res.data.success).toBe(false);
      expect(res.data.message).toContain('"items[0].sourceId" is required');
    });

    it('ranks next-segment suggestions and applies the limit', async () => {
      const res = await client.post<ApiBody<NextSuggestion[]>>('/api/mixes/suggest-next', {
        current: item('a', 70, 'english', 120),
        candidates: [item('c', 70, 'english', 90), item('b', 60, 'hindi', 122)],
        recentLanguages: ['english'],
        limit: 1,
      });

      expect(res.status).toBe(200);
      expect(res.data.data.map((s) => [s.item.id, s.score])).toEqual([['b', 109]]);
    });
  });

  describe('analysis', () => {
    beforeEach(async () => {
      await fs.promises.writeFile(path.join(settings.paths.libraryDir, 'song.wav'), 'placeholder');
      await fs.promises.writeFile(path.join(settings.paths.libraryDir, 'broken.wav'), 'placeholder');
    });

    it('finds the loud half of a track', async () => {
      const res = await client.post<ApiBody<AnalysisBody>>('/api/analysis', {
        path: 'song.wav',
        highlight: false,
        minSegmentSeconds: 5,
        maxSegmentSeconds: 8,
        maxSegments: 1,
      });

      expect(res.status).toBe(200);
      const data = res.data.data;
      expect(data.framesPerSecond).toBe(22050 / 512);
      expect(data.energyCurve).toHaveLength(862);
      expect(data.segments).toHaveLength(1);
      expect(data.segments[0].isPrimary).toBe(true);
      expect(data.segments[0].startTime).toBeGreaterThanOrEqual(9);
      expect(data.highlight).toBeUndefined();
    });

    it('returns the highlight window when asked', async () => {
      const res = await client.post<ApiBody<AnalysisBody>>('/api/analysis', { path: 'song.wav', durationSeconds: 20 });

      expect(res.status).toBe(200);
      expect(res.data.data.segments).toEqual([]);
      expect(res.data.data.highlight?.segment).toMatchObject({ isPrimary: true, label: 'peak_energy' });
    });

    it('reports decode failures with their stage', async () => {
      const res = await client.post<ApiBody<unknown>>('/api/analysis', { path: 'broken.wav' });

      expect(res.status).toBe(422);
      expect(res.data).toMatchObject({ success: false, message: 'corrupt header', stage: 'decode' });
    });

    it('refuses paths outside the media library', async () => {
      const res = await client.post<ApiBody<unknown>>('/api/analysis', { path: '../secret.wav' });

      expect(res.status).toBe(404);
      expect(res.data.message).toBe('Source "../secret.wav" is outside the media library');
    });

    it('uses the popularity curve of a fetched source to pick the highlight', async () => {
      fetcher.catalog.set('clip-plain', { durationSeconds: 20 });
      fetcher.catalog.set('clip-replayed', {
        durationSeconds: 20,
        popularity: [
          { startTime: 0, endTime: 5, value: 0.9 },
          { startTime: 5, endTime: 10, value: 0.4 },
        ],
      });

      const plain = await client.post<ApiBody<AnalysisBody>>('/api/analysis', { sourceId: 'clip-plain' });
      const replayed = await client.post<ApiBody<AnalysisBody>>('/api/analysis', { sourceId: 'clip-replayed' });

      expect(plain.status).toBe(200);
      expect(plain.data.data.highlight?.choice.source).toBe('energy');
      expect(plain.data.data.highlight?.choice.startTime).toBeGreaterThan(0);
      expect(plain.data.data.highlight?.segment.label).toBe('peak_energy');

      expect(replayed.status).toBe(200);
      expect(replayed.data.data.highlight?.choice).toMatchObject({ source: 'popularity', startTime: 0, popularityScore: 0.9 });
      expect(replayed.data.data.highlight?.segment.label).toBe('most_replayed');
    });

    it('keeps the popularity curve of a source served from the cache', async () => {
      fetcher.catalog.set('clip-replayed', { durationSeconds: 20, popularity: [{ startTime: 0, endTime: 5, value: 0.9 }] });

      await client.post<ApiBody<AnalysisBody>>('/api/analysis', { sourceId: 'clip-replayed', highlight: false });
      fetcher.catalog.clear();
      const cached = await client.post<ApiBody<AnalysisBody>>('/api/analysis', { sourceId: 'clip-replayed' });

      expect(cached.data.data.highlight?.choice).toMatchObject({ source: 'popularity', startTime: 0 });
    });

    it('requires exactly one of path and sourceId', async () => {
      const neither = await client.post<ApiBody<unknown>>('/api/analysis', { highlight: false });
      const both = await client.post<ApiBody<unknown>>('/api/analysis', { path: 'song.wav', sourceId: 'clip-plain' });

      expect(neither.status).toBe(400);
      expect(both.status).toBe(400);
    });

    it('returns 404 for a missing file', async () => {
      const res = await client.post<ApiBody<unknown>>('/api/analysis', { path: 'nope.wav' });

      expect(res.status).toBe(404);
      expect(res.data.message).toBe('File not found in media library: nope.wav');
    });
  });

  describe('exports', () => {
    const exportBody = {
      name: 'Friday Mix',
      entries: [item('a', 70, 'english', 120), item('b', 60, 'hindi', 122)],
      options: { intro: false, outro: false, textOverlay: false },
    };

    it('runs an export to completion', async () => {
      const created = await client.post<ApiBody<CompositionJob>>('/api/mixes/exports', exportBody);

      expect(created.status).toBe(202);
      expect(created.data.data).toMatchObject({ status: 'pending', totalSegments: 2 });

      await engine.dispatcher.close();
      const res = await client.get<ApiBody<CompositionJob>>(`/api/mixes/exports/${created.data.data.id}`);

      expect(res.status).toBe(200);
      expect(res.data.data).toMatchObject({
        status: 'complete',
        progress: 100,
        outputPath: path.join(settings.paths.exportsDir, `Friday_Mix_${created.data.data.id}.mp4`),
      });
    });

    it('rejects an export with fewer than two entries', async () => {
      const res = await client.post<ApiBody<unknown>>('/api/mixes/exports', { ...exportBody, entries: [exportBody.entries[0]] });

      expect(res.status).toBe(400);
      expect(res.data.message).toBe('"entries" must contain at least 2 items');
    });

    it('cancels a running export', async () => {
      fetcher.gated = true;
      const created = await client.post<ApiBody<CompositionJob>>('/api/mixes/exports', exportBody);
      const id = created.data.data.id;

      const cancelled = await client.post<ApiBody<CompositionJob>>(`/api/mixes/exports/${id}/cancel`);
      expect(cancelled.status).toBe(202);
      expect(cancelled.data.message).toBe('Cancellation requested');

      fetcher.open();
      await engine.dispatcher.close();

      const res = await client.get<ApiBody<CompositionJob>>(`/api/mixes/exports/${id}`);
      expect(res.data.data).toMatchObject({ status: 'cancelled', currentStage: 'Cancelled' });
    });

    it('refuses to cancel a finished export', async () => {
      const created = await client.post<ApiBody<CompositionJob>>('/api/mixes/exports', exportBody);
      await engine.dispatcher.close();

      const res = await client.post<ApiBody<unknown>>(`/api/mixes/exports/${created.data.data.id}/cancel`);

      expect(res.status).toBe(409);
      expect(res.data.message).toBe('Export has already finished');
    });

    it('returns 404 for unknown exports', async () => {
      const status = await client.get<ApiBody<unknown>>('/api/mixes/exports/missing');
      const cancel = await client.post<ApiBody<unknown>>('/api/mixes/exports/missing/cancel');

      expect(status.status).toBe(404);
      expect(status.data.message).toBe('Export not found');
      expect(cancel.status).toBe(404);
    });
  });
});
