// ===========================================================================
// Voice Provider Abstraction
//
// A voice provider turns one line of commentary into an audio file. The
// voice manager tries the configured providers in order, so a local speech
// command can stand in when the HTTP service is down.
// ===========================================================================

export interface IVoiceProvider {
  /** Provider identifier, used in logs and warnings */
  readonly name: string;

  /** Whether this provider is configured and ready */
  isConfigured(): boolean;

  /** Synthesize `text` with `voice` into `outputPath`; resolves with the written path */
  synthesize(text: string, voice: string, outputPath: string): Promise<string>;
}
