import fs from 'fs';
import type { MediaTranscoder, StreamDurations, TranscodeCommand, TranscodeResult } from '../services/media/transcoder.interface';
import { playableDuration } from '../services/media/transcoder.interface';

export const uniform = (seconds: number): StreamDurations => ({ video: seconds, audio: seconds, format: seconds });

function optionValue(options: string[], name: string): number | undefined {
  const i = options.lastIndexOf(name);
  return i >= 0 && i + 1 < options.length ? Number(options[i + 1]) : undefined;
}

function concatEntries(listPath: string): string[] {
  return fs
    .readFileSync(listPath, 'utf8')
    .split('\n')
    .filter((line) => line.startsWith('file '))
    .map((line) => line.slice("file '".length, -1).replace(/'\\''/g, "'"));
}

/**
 * In-process transcoder: writes a placeholder file for every command and
 * remembers the stream durations a real encode would have produced.
 */
export class FakeTranscoder implements MediaTranscoder {
  readonly commands: TranscodeCommand[] = [];
  private readonly durations = new Map<string, StreamDurations>();

  /** Return a failed result for matching commands */
  fail?: (command: TranscodeCommand) => TranscodeResult | undefined;
  /** Durations to report for a command's output instead of the derived ones */
  override?: (command: TranscodeCommand) => StreamDurations | undefined;
  /** Called before every command runs */
  onRun?: (command: TranscodeCommand) => void;

  constructor(private readonly defaultDurations: StreamDurations = uniform(180)) {}

  setDurations(filePath: string, durations: StreamDurations): void {
    this.durations.set(filePath, durations);
  }

  labels(): string[] {
    return this.commands.map((c) => c.label);
  }

  async run(command: TranscodeCommand): Promise<TranscodeResult> {
    this.commands.push(command);
    this.onRun?.(command);

    const failure = this.fail?.(command);
    if (failure) return failure;

    const durations = this.override?.(command) ?? this.derive(command);
    await fs.promises.writeFile(command.outputPath, `fake:${command.label}`);
    this.durations.set(command.outputPath, durations);
    return { ok: true };
  }

  async probe(filePath: string): Promise<StreamDurations> {
    const known = this.durations.get(filePath);
    if (known) return known;
    if (!fs.existsSync(filePath)) {
      throw new Error(`No such file: ${filePath}`);
    }
    return this.defaultDurations;
  }

  private known(filePath: string): StreamDurations {
    return this.durations.get(filePath) ?? this.defaultDurations;
  }

  private derive(command: TranscodeCommand): StreamDurations {
    const t = optionValue(command.outputOptions, '-t');
    if (t !== undefined) return uniform(t);

    if (command.label.startsWith('transition')) {
      const overlap = Number(/xfade=transition=\w+:duration=([\d.]+)/.exec(command.filterComplex ?? '')?.[1] ?? 0);
      const total = command.inputs.reduce((sum, input) => sum + playableDuration(this.known(input.source)), 0);
      return uniform(total - overlap);
    }
    if (command.label.startsWith('concat')) {
      const total = concatEntries(command.inputs[0].source).reduce((sum, p) => sum + playableDuration(this.known(p)), 0);
      return uniform(total);
    }
    if (command.label === 'commentary' || command.label.startsWith('voice-polish')) {
      return this.known(command.inputs[0].source);
    }
    return this.defaultDurations;
  }
}
