/**
 * Text-to-structure service the inference extractor delegates to.
 *
 * `generate` must reject with `RateLimitError` when the service asks the
 * caller to slow down; any other rejection is treated as terminal.
 */
export interface InferenceClient {
  generate(prompt: string, model?: string): Promise<string>;
  /** Models the service can serve right now, when it can tell */
  listModels?(): Promise<string[]>;
}
