import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// project root = one level above src/
const PROJECT_ROOT = path.resolve(__dirname, "..");

export type PromptName = "article_system" | "article_user" | "context_block";

export const OUTPUT_SIZES = ["SHORT", "MEDIUM", "LONG"] as const;
export type OutputSize = (typeof OUTPUT_SIZES)[number];

export const SIZE_GUIDANCE: Record<OutputSize, string> = {
  SHORT: "The article should be approximately 1-2 pages long (500-1000 words).",
  MEDIUM: "The article should be approximately 2-4 pages long (1000-2000 words).",
  LONG: "The article should be approximately 4-6 pages long (2000-3000 words).",
};

export type InstructionPair = {
  systemInstruction: string;
  userInstruction: string;
};

const templateCache = new Map<PromptName, string>();

export function readPromptTemplate(name: PromptName): string {
  const cached = templateCache.get(name);
  if (cached !== undefined) return cached;

  const file = path.join(PROJECT_ROOT, "prompts", `${name}.md`);
  const text = readFileSync(file, "utf-8").replace(/\r?\n$/, "");
  templateCache.set(name, text);
  return text;
}

export function fillTemplate(text: string, vars: Record<string, string>): string {
  // Single pass, so substituted values are never scanned for placeholders again.
  return text.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    Object.hasOwn(vars, key) ? vars[key] : placeholder
  );
}

export function sizeGuidance(size: string): string {
  return isOutputSize(size) ? SIZE_GUIDANCE[size] : SIZE_GUIDANCE.MEDIUM;
}

function isOutputSize(size: string): size is OutputSize {
  return OUTPUT_SIZES.some((s) => s === size);
}

export function formatTranscripts(transcripts: string[]): string {
  return transcripts.map((t, i) => `\n\n--- TRANSCRIPT ${i + 1} ---\n\n${t}\n`).join("");
}

export function buildArticlePrompt(
  transcripts: string[],
  context: string | undefined,
  size: string
): InstructionPair {
  const contextBlock =
    context && context.trim() ? fillTemplate(readPromptTemplate("context_block"), { topic: context }) : "";

  const systemInstruction = fillTemplate(readPromptTemplate("article_system"), {
    size_guidance: sizeGuidance(size),
  });

  const userInstruction = fillTemplate(readPromptTemplate("article_user"), {
    context_block: contextBlock,
    transcripts: formatTranscripts(transcripts),
  });

  return { systemInstruction, userInstruction };
}
