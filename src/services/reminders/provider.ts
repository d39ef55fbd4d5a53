/**
 * Completion provider seam.
 *
 * The interpreter only needs "prompt in, text out"; any model backend can
 * sit behind this interface. The Anthropic implementation lives in
 * services/anthropic/provider.ts.
 */

export interface CompletionRequest {
  system: string;
  user: string;
}

export interface CompletionProvider {
  /** Short identifier used in logs */
  readonly name: string;
  /** Return the raw completion text (empty string if the model produced none) */
  complete(request: CompletionRequest): Promise<string>;
}
