import "dotenv/config";
import { z } from "zod";

import { ConfigurationError, NoInputError } from "./errors";
import { OUTPUT_SIZES, type OutputSize } from "./prompts";
import type { ThinkingEffort } from "./llm";

export const MAX_URLS = 10;

const URL_FLAGS = Array.from({ length: MAX_URLS }, (_, i) => `url-${i + 1}`);
const VALUE_FLAGS = new Set([...URL_FLAGS, "context", "output-size", "enable-research", "delay"]);

export const USAGE = `Usage: tsx src/generate.ts --url-1 <url|id> [--url-2 <url|id> ... --url-${MAX_URLS} <url|id>]
  --context <text>                 topic for the article (optional)
  --output-size SHORT|MEDIUM|LONG  article length (default: MEDIUM)
  --enable-research true|false     let the model search the web (default: true)
  --delay <seconds>                pause between transcript downloads (default: 15)

Environment: OPENAI_API_KEY (required), ARTICLE_MODEL, THINKING_EFFORT, ARTICLES_DIR, LOGS_DIR`;

export type CliOptions = {
  help: boolean;
  urls: string[];
  context: string;
  outputSize: OutputSize;
  enableResearch: boolean;
  delaySeconds: number;
};

export type EnvConfig = {
  apiKey: string;
  model: string;
  thinkingEffort: ThinkingEffort;
  articlesDir: string;
  logsDir: string;
};

const CliSchema = z.object({
  context: z.string().default(""),
  "output-size": z
    .string()
    .default("MEDIUM")
    .transform((s) => s.trim().toUpperCase())
    .pipe(z.enum(OUTPUT_SIZES)),
  "enable-research": z
    .string()
    .default("true")
    .transform((s) => s.trim().toLowerCase() === "true"),
  delay: z
    .string()
    .default("15")
    .transform((s) => (s.trim() === "" ? Number.NaN : Number(s)))
    .pipe(z.number().int().min(0)),
});

const EnvSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: "Missing OPENAI_API_KEY. Run: export OPENAI_API_KEY=..." })
    .trim()
    .min(1, "Missing OPENAI_API_KEY. Run: export OPENAI_API_KEY=..."),
  ARTICLE_MODEL: z.string().min(1).default("gpt-5"),
  THINKING_EFFORT: z.enum(["low", "medium", "high"]).default("high"),
  ARTICLES_DIR: z.string().min(1).default("articles"),
  LOGS_DIR: z.string().min(1).default("logs"),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// Accepts both `--flag value` and `--flag=value`.
export function readFlags(argv: string[]): { flags: Record<string, string>; help: boolean } {
  const flags: Record<string, string> = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    if (!VALUE_FLAGS.has(name)) {
      throw new ConfigurationError(`Unknown option: --${name}`);
    }

    if (eq >= 0) {
      flags[name] = arg.slice(eq + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new ConfigurationError(`Option --${name} needs a value`);
    }
    flags[name] = next;
    i++;
  }

  return { flags, help };
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { flags, help } = readFlags(argv);
  if (help) {
    return { help, urls: [], context: "", outputSize: "MEDIUM", enableResearch: true, delaySeconds: 15 };
  }

  const urls = URL_FLAGS.map((flag) => flags[flag] ?? "").filter((url) => url.trim() !== "");
  if (flags["url-1"] === undefined || urls.length === 0) {
    throw new NoInputError("At least one YouTube URL is required (--url-1)");
  }

  const parsed = CliSchema.safeParse(flags);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid options: ${formatIssues(parsed.error)}`);
  }

  return {
    help,
    urls,
    context: parsed.data.context,
    outputSize: parsed.data["output-size"],
    enableResearch: parsed.data["enable-research"],
    delaySeconds: parsed.data.delay,
  };
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  return {
    apiKey: parsed.data.OPENAI_API_KEY,
    model: parsed.data.ARTICLE_MODEL,
    thinkingEffort: parsed.data.THINKING_EFFORT,
    articlesDir: parsed.data.ARTICLES_DIR,
    logsDir: parsed.data.LOGS_DIR,
  };
}
