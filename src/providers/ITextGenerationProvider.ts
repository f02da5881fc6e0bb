/**
 * Text generation interface used by the synthesis consumers.
 * A request carries exactly two strings; callers decide what goes in them.
 */

export interface TextGenerationRequest {
  /** Instructions for the model. */
  system: string;
  /** The factual input. */
  prompt: string;
}

export interface ITextGenerationProvider {
  readonly model: string;
  complete(request: TextGenerationRequest): Promise<string>;
}
