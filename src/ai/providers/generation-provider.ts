import fetch, { RequestInit, Response } from "node-fetch";

export interface GenerationRequest {
  prompt: string;
  reviewsText: string;
}

export interface GenerationOutput {
  text: string;
  finishReason: string | null;
}

export interface TextGenerationProvider {
  readonly name: string;
  getModelName(): string;
  generate(request: GenerationRequest): Promise<GenerationOutput>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * The provider answered 2xx but the body carries no generated text
 * (blocked prompt, empty candidate list).
 */
export class EmptyGenerationError extends Error {
  constructor(
    message: string,
    readonly rawBody: string,
    readonly finishReason: string | null,
  ) {
    super(message);
    this.name = "EmptyGenerationError";
  }
}

export function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}
