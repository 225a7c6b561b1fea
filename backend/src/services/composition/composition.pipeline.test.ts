import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadMixSettings, type MixSettings } from '../../config/env';
import { FakeTranscoder } from '../../test-support/fake-transcoder';
import type { ExportOptions, MixExportRequest, ProgressEvent, SequencerItem } from '../../types/mix.types';
import type { IVoiceProvider } from '../commentary/voice-provider.interface';
import { VoiceManager } from '../commentary/voice-manager.service';
import { SourceCache } from '../sources/source-cache';
import type { FetchedSource, SourceFetcher } from '../sources/source-fetcher.interface';
import { CompositionPipeline, outputFileName } from './composition.pipeline';
import { JobRegistry } from './job-registry';

class FakeFetcher implements SourceFetcher {
  readonly name = 'fake';
  readonly unavailable = new Set<string>();

  async fetch(sourceId: string, destination: string): Promise<FetchedSource> {
    if (this.unavailable.has(sourceId)) throw new Error(`Source "${sourceId}" unavailable`);
    await fs.promises.writeFile(destination, `source:${sourceId}`);
    return { path: destination, durationSeconds: 180 };
  }
}

class FakeVoice implements IVoiceProvider {
  readonly name = 'fake-voice';
  constructor(private readonly transcoder: FakeTranscoder) {}
  isConfigured(): boolean {
    return true;
  }
  async synthesize(text: string, _voice: string, outputPath: string): Promise<string> {
    await fs.promises.writeFile(outputPath, text);
    this.transcoder.setDurations(outputPath, { video: 0, audio: 2, format: 2 });
    return outputPath;
  }
}

const item = (n: number, language: string, title: string): SequencerItem => ({
  id: `item-${n}`,
  sourceId: `src-${n}`,
  segment: { startTime: 10, endTime: 40, duration: 30, energyScore: 70, isPrimary: true, label: 'peak_energy' },
  track: { tempoBpm: 120, energyScore: 70, language, title, artist: `Artist ${n}`, sourceDuration: 200 },
});

const baseOptions: ExportOptions = {
  transition: 'fade',
  transitionDuration: 3.5,
  textOverlay: true,
  quality: '720p',
  intro: true,
  outro: true,
  introTitle: 'DJ MIX',
  outroMessage: 'Goodnight',
};

describe('CompositionPipeline', () => {
  let home: string;
  let settings: MixSettings;
  let transcoder: FakeTranscoder;
  let fetcher: FakeFetcher;
  let registry: JobRegistry;
  let providers: IVoiceProvider[];

  const request = (overrides: Partial<MixExportRequest> = {}): MixExportRequest => ({
    name: 'Friday Mix',
    entries: [item(1, 'english', 'Song A'), item(2, 'hindi', 'Song B'), item(3, 'hindi', 'Song C')],
    options: baseOptions,
    ...overrides,
  });

  const pipeline = () =>
    new CompositionPipeline({
      settings,
      transcoder,
      sources: new SourceCache(settings.paths.cacheDir, fetcher),
      voices: new VoiceManager(providers, transcoder),
    });

  beforeEach(async () => {
    home = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
    settings = loadMixSettings({ CLIPMIX_HOME: home });
    transcoder = new FakeTranscoder();
    fetcher = new FakeFetcher();
    registry = new JobRegistry();
    providers = [new FakeVoice(transcoder)];
  });

  afterEach(async () => {
    await fs.promises.rm(home, { recursive: true, force: true });
  });

  it('composes intro, segments and outro into one artifact', async () => {
    const handle = registry.create(3, 'job-ok');
    const events: ProgressEvent[] = [];
    registry.subscribe('job-ok', (e) => events.push(e));

    const result = await pipeline().run(handle, request());

    const outputPath = path.join(settings.paths.exportsDir, 'Friday_Mix_job-ok.mp4');
    expect(result?.outputPath).toBe(outputPath);
    expect(result?.segmentsUsed).toBe(3);
    expect(result?.durationSeconds).toBeCloseTo(87.2, 6);
    expect(result?.fileSizeBytes).toBe('fake:transition-4'.length);
    expect(transcoder.labels()).toEqual([
      'intro',
      'segment-1',
      'segment-2',
      'segment-3',
      'outro',
      'transition-1',
      'transition-2',
      'transition-3',
      'transition-4',
    ]);
    expect(transcoder.commands[1].filterComplex).toContain("drawtext=text='Song A'");

    expect(events.map((e) => [e.status, e.progress])).toEqual([
      ['processing', 5],
      ['downloading', 10],
      ['processing', 13],
      ['downloading', 33],
      ['processing', 36],
      ['downloading', 57],
      ['processing', 60],
      ['processing', 82],
      ['concatenating', 84],
      ['encoding', 98],
      ['complete', 100],
    ]);
    expect(registry.get('job-ok')).toMatchObject({ status: 'complete', outputPath, warnings: [] });

    const record: unknown = JSON.parse(
      await fs.promises.readFile(path.join(settings.paths.exportsDir, 'Friday_Mix_job-ok.job.json'), 'utf8')
    );
    expect(record).toMatchObject({ job: { id: 'job-ok', status: 'complete' }, name: 'Friday Mix', segmentsUsed: 3 });
    expect(await fs.promises.readdir(settings.paths.workDir)).toEqual([]);
  });

  it('keeps concurrent exports of the same mix name apart', async () => {
    const first = registry.create(3, 'job-a');
    const second = registry.create(3, 'job-b');
    const shared = pipeline();

    const [a, b] = await Promise.all([shared.run(first, request({ name: 'Party' })), shared.run(second, request({ name: 'Party' }))]);

    expect(a?.outputPath).toBe(path.join(settings.paths.exportsDir, 'Party_job-a.mp4'));
    expect(b?.outputPath).toBe(path.join(settings.paths.exportsDir, 'Party_job-b.mp4'));
    expect((await fs.promises.readdir(settings.paths.exportsDir)).sort()).toEqual([
      'Party_job-a.job.json',
      'Party_job-a.mp4',
      'Party_job-b.job.json',
      'Party_job-b.mp4',
    ]);
    expect(registry.get('job-a')?.status).toBe('complete');
    expect(registry.get('job-b')?.status).toBe('complete');
  });

  it('skips a segment whose source cannot be fetched', async () => {
    fetcher.unavailable.add('src-2');
    const handle = registry.create(3, 'job-skip');

    const result = await pipeline().run(handle, request());

    expect(result?.segmentsUsed).toBe(2);
    expect(registry.get('job-skip')).toMatchObject({
      status: 'complete',
      warnings: ['Skipped segment 2/3 (Song B): Source "src-2" unavailable'],
    });
    expect(transcoder.labels()).toEqual([
      'intro',
      'segment-1',
      'segment-3',
      'outro',
      'transition-1',
      'transition-2',
      'transition-3',
    ]);
  });

  it('fails when fewer than two segments survive', async () => {
    fetcher.unavailable.add('src-1');
    fetcher.unavailable.add('src-3');
    const handle = registry.create(3, 'job-few');

    const result = await pipeline().run(handle, request());

    expect(result).toBeUndefined();
    expect(registry.get('job-few')).toMatchObject({
      status: 'failed',
      error: { stage: 'processing', message: 'Only 1 of 3 segments could be prepared; at least 2 are required' },
    });
    expect(fs.existsSync(path.join(settings.paths.exportsDir, 'Friday_Mix_job-few.mp4'))).toBe(false);
    expect(await fs.promises.readdir(settings.paths.workDir)).toEqual([]);
  });

  it('rejects a request with a single segment', async () => {
    const handle = registry.create(1, 'job-one');

    await pipeline().run(handle, request({ entries: [item(1, 'english', 'Song A')] }));

    expect(registry.get('job-one')).toMatchObject({
      status: 'failed',
      error: { stage: 'pending', message: 'At least 2 segments are required, got 1' },
    });
    expect(transcoder.commands).toEqual([]);
  });

  it('stops and cleans up when cancelled mid-run', async () => {
    const handle = registry.create(3, 'job-cancel');
    transcoder.onRun = (cmd) => {
      if (cmd.label === 'segment-2') registry.requestCancel('job-cancel');
    };

    const result = await pipeline().run(handle, request());

    expect(result).toBeUndefined();
    expect(registry.get('job-cancel')?.status).toBe('cancelled');
    expect(transcoder.labels()).toEqual(['intro', 'segment-1', 'segment-2']);
    expect(await fs.promises.readdir(settings.paths.workDir)).toEqual([]);
  });

  it('keeps going without intro when the title card fails', async () => {
    transcoder.fail = (cmd) => (cmd.label === 'intro' ? { ok: false, message: 'drawtext failed', stderr: '', resource: false } : undefined);
    const handle = registry.create(3, 'job-nointro');

    const result = await pipeline().run(handle, request());

    expect(result?.segmentsUsed).toBe(3);
    expect(registry.get('job-nointro')?.warnings).toEqual(['Skipped intro: intro: drawtext failed']);
  });

  it('overlays scheduled commentary', async () => {
    const handle = registry.create(3, 'job-voice');

    const result = await pipeline().run(
      handle,
      request({ options: { ...baseOptions, commentary: { enabled: true, voice: 'energetic_male', frequency: 'moderate' } } })
    );

    expect(transcoder.labels()[transcoder.labels().length - 1]).toBe('commentary');
    expect(result?.commentaryCues.map((c) => [c.kind, c.scheduledTime, c.clipDuration])).toEqual([
      ['intro', 2, 2],
      ['mid', 43.6, 2],
      ['outro', 79.2, 2],
    ]);
    expect(result?.commentaryCues.every((c) => c.clipPath === undefined)).toBe(true);
    expect(registry.get('job-voice')?.warnings).toEqual([]);
  });

  it('completes without commentary when no voice can be rendered', async () => {
    providers = [];
    const handle = registry.create(3, 'job-novoice');

    const result = await pipeline().run(
      handle,
      request({ options: { ...baseOptions, commentary: { enabled: true, voice: 'energetic_male', frequency: 'moderate' } } })
    );

    expect(result?.commentaryCues).toEqual([]);
    expect(registry.get('job-novoice')).toMatchObject({
      status: 'complete',
      warnings: ['Skipped commentary: No voice provider configured'],
    });
    expect(transcoder.labels()).not.toContain('commentary');
  });
});

describe('outputFileName', () => {
  it('keeps a file-system safe version of the mix name', () => {
    expect(outputFileName('Friday Mix')).toBe('Friday_Mix');
    expect(outputFileName(' ../party!! ')).toBe('party');
    expect(outputFileName('***')).toBe('mix');
  });
});
