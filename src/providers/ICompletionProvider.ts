/**
 * Text completion provider interface.
 * The engine's only dependency on a language model: prompt in, text out.
 * Implementations throw CompletionError on failure.
 */

export interface CompletionOptions {
  /**
   * Aborts the call. Once aborted, implementations reject with `signal.reason`
   * and make no further requests.
   */
  signal?: AbortSignal;
}

export interface ICompletionProvider {
  /** Return the model's completion for the prompt. */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
