import { execFile } from 'child_process';
import { promisify } from 'util';
import fs from 'fs';
import type { IVoiceProvider } from './voice-provider.interface';

const execFileAsync = promisify(execFile);

/**
 * Split a command template into argv and substitute `{text}`, `{voice}` and
 * `{output}` per argument, so spoken text never goes through a shell.
 *
 *   "edge-tts --voice {voice} --text {text} --write-media {output}"
 */
export function buildVoiceCommand(
  template: string,
  values: { text: string; voice: string; output: string }
): { file: string; args: string[] } {
  const [file, ...rest] = template.trim().split(/\s+/);
  if (!file) {
    throw new Error('Voice command template is empty');
  }
  const args = rest.map((arg) =>
    arg.replace(/\{(text|voice|output)\}/g, (_m, key: 'text' | 'voice' | 'output') => values[key])
  );
  return { file, args };
}

/**
 * Local text-to-speech program run once per clip.
 */
class CommandVoiceProvider implements IVoiceProvider {
  readonly name = 'command';

  constructor(
    private readonly template?: string,
    private readonly timeoutMs = 60000
  ) {}

  isConfigured(): boolean {
    return Boolean(this.template && this.template.trim());
  }

  async synthesize(text: string, voice: string, outputPath: string): Promise<string> {
    if (!this.template) {
      throw new Error('Voice command not configured');
    }
    const { file, args } = buildVoiceCommand(this.template, { text, voice, output: outputPath });
    await execFileAsync(file, args, { timeout: this.timeoutMs });

    if (!fs.existsSync(outputPath)) {
      throw new Error(`Voice command produced no file at ${outputPath}`);
    }
    return outputPath;
  }
}

export { CommandVoiceProvider };
