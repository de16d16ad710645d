import OpenAI from "openai";
import { GenerationFailureError } from "./errors";
import type { InstructionPair } from "./prompts";

export type ThinkingEffort = "low" | "medium" | "high";

export type GenerationRequest = InstructionPair & {
  model: string;
  research: boolean;
  thinkingEffort: ThinkingEffort;
};

export interface ArticleGenerator {
  stream(request: GenerationRequest): AsyncIterable<string>;
}

// The subset of a Responses API stream event this module reads.
export type ResponseEventLike = {
  type: string;
  delta?: unknown;
  message?: unknown;
};

export async function* textDeltas(events: AsyncIterable<ResponseEventLike>): AsyncGenerator<string> {
  for await (const event of events) {
    if (event.type === "response.output_text.delta") {
      if (typeof event.delta === "string" && event.delta) yield event.delta;
    } else if (event.type === "error") {
      throw new GenerationFailureError(
        `Generation stream error: ${typeof event.message === "string" ? event.message : "unknown"}`
      );
    } else if (event.type === "response.failed" || event.type === "response.incomplete") {
      throw new GenerationFailureError(`Generation ended with ${event.type}`);
    }
  }
}

export class OpenAIArticleGenerator implements ArticleGenerator {
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async *stream(request: GenerationRequest): AsyncGenerator<string> {
    const events = await this.client.responses.create({
      model: request.model,
      instructions: request.systemInstruction,
      input: request.userInstruction,
      reasoning: { effort: request.thinkingEffort },
      // Web search also lets the model open and cite the URLs it finds.
      tools: request.research ? [{ type: "web_search_preview" }] : undefined,
      stream: true,
    });

    yield* textDeltas(events);
  }
}

/**
 * Drains a stream of text fragments in arrival order, handing each one to
 * `onChunk` as it comes in. Any failure surfaces as a GenerationFailureError.
 */
export async function collectStream(
  chunks: AsyncIterable<string>,
  onChunk?: (chunk: string) => void
): Promise<string> {
  let full = "";
  try {
    for await (const chunk of chunks) {
      full += chunk;
      onChunk?.(chunk);
    }
  } catch (e) {
    if (e instanceof GenerationFailureError) throw e;
    throw new GenerationFailureError("Error generating article", e);
  }
  return full;
}
