import { setTimeout as sleepMs } from "node:timers/promises";
import { pathToFileURL } from "node:url";

import { parseArticleResponse, saveArticle, type GeneratedArticle } from "./article";
import { USAGE, loadEnvConfig, parseCliArgs } from "./config";
import { NoInputError, describeError } from "./errors";
import { collectStream, OpenAIArticleGenerator, type ArticleGenerator, type ThinkingEffort } from "./llm";
import { createRunId, createRunLog, flushRunLog, logEvent, type RunLog } from "./logger";
import { buildArticlePrompt, type OutputSize } from "./prompts";
import { extractVideoId, fetchTranscriptText, type FetchedTranscript } from "./transcripts";

export type GenerateOptions = {
  urls: string[];
  context: string;
  outputSize: OutputSize;
  enableResearch: boolean;
  delaySeconds: number;
  model: string;
  thinkingEffort: ThinkingEffort;
  articlesDir: string;
};

export type GenerateDeps = {
  fetchTranscript: (videoId: string) => Promise<FetchedTranscript>;
  generator: ArticleGenerator;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  onChunk?: (chunk: string) => void;
  log?: RunLog;
};

export type GenerateResult = {
  article: GeneratedArticle;
  file: string;
  transcriptCount: number;
  skipped: string[];
};

async function collectTranscripts(options: GenerateOptions, deps: GenerateDeps, log: RunLog) {
  const sleep = deps.sleep ?? ((ms: number) => sleepMs(ms));
  const transcripts: string[] = [];
  const skipped: string[] = [];

  for (const [i, url] of options.urls.entries()) {
    const isLast = i === options.urls.length - 1;
    try {
      const videoId = extractVideoId(url);
      console.log(`▶ Getting transcript for video: ${videoId}...`);
      const fetched = await deps.fetchTranscript(videoId);
      transcripts.push(fetched.text);
      log.sources.push({ reference: url, videoId, language: fetched.language, charCount: fetched.text.length });
      console.log(`  ✅ Downloaded transcript (${fetched.snippetCount} entries, ${fetched.text.length} chars)`);

      if (!isLast && options.delaySeconds > 0) {
        console.log(`  ⏳ Waiting ${options.delaySeconds} seconds before next download...`);
        await sleep(options.delaySeconds * 1000);
      }
    } catch (e) {
      // Per-reference failures never abort the run.
      skipped.push(url);
      log.sources.push({ reference: url, error: describeError(e) });
      console.error(`⚠ Error downloading transcript for ${url}: ${describeError(e)}`);
      console.error(`  Skipping this video and continuing...`);
    }
  }

  return { transcripts, skipped };
}

export async function generateArticle(options: GenerateOptions, deps: GenerateDeps): Promise<GenerateResult> {
  const log = deps.log ?? createRunLog(createRunId());
  const now = deps.now ?? (() => new Date());

  if (options.urls.length === 0) {
    throw new NoInputError("At least one YouTube URL is required");
  }

  console.log(`▶ Processing ${options.urls.length} YouTube video(s)...`);
  const { transcripts, skipped } = await collectTranscripts(options, deps, log);

  if (transcripts.length === 0) {
    throw new NoInputError("No transcripts were successfully downloaded");
  }
  console.log(`✅ Successfully downloaded ${transcripts.length} transcript(s)`);
  logEvent(log, "transcripts_collected", { count: transcripts.length, skipped: skipped.length });

  const prompt = buildArticlePrompt(transcripts, options.context, options.outputSize);

  console.log(`▶ Generating article with ${options.model}... this may take a few minutes`);
  let received = "";
  const recordCall = (response: string, complete: boolean) => {
    log.llm_call = {
      model: options.model,
      research: options.enableResearch,
      thinkingEffort: options.thinkingEffort,
      systemInstruction: prompt.systemInstruction,
      userInstruction: prompt.userInstruction,
      response,
      complete,
      timestamp: now().toISOString(),
    };
  };

  let response: string;
  try {
    response = await collectStream(
      deps.generator.stream({
        ...prompt,
        model: options.model,
        research: options.enableResearch,
        thinkingEffort: options.thinkingEffort,
      }),
      (chunk) => {
        received += chunk;
        deps.onChunk?.(chunk);
      }
    );
  } catch (e) {
    // Keep the partial response for debugging before giving up.
    recordCall(received, false);
    throw e;
  }
  recordCall(response, true);
  console.log(`\n✅ Article generation complete`);

  const article = parseArticleResponse(response, now());
  const file = await saveArticle(options.articlesDir, article);
  log.output = { title: article.title, hashtags: article.hashtags, file };

  return { article, file, transcriptCount: transcripts.length, skipped };
}

export type MainDeps = {
  fetchTranscript?: (videoId: string) => Promise<FetchedTranscript>;
  createGenerator?: (apiKey: string) => ArticleGenerator;
  sleep?: (ms: number) => Promise<void>;
};

export async function main(
  argv: string[] = process.argv.slice(2),
  envVars: NodeJS.ProcessEnv = process.env,
  deps: MainDeps = {}
) {
  const cli = parseCliArgs(argv);
  if (cli.help) {
    console.log(USAGE);
    return;
  }
  // Credentials are checked before any network call.
  const env = loadEnvConfig(envVars);

  const log = createRunLog(createRunId());
  logEvent(log, "start", { urls: cli.urls, outputSize: cli.outputSize, research: cli.enableResearch });

  try {
    const result = await generateArticle(
      { ...cli, model: env.model, thinkingEffort: env.thinkingEffort, articlesDir: env.articlesDir },
      {
        fetchTranscript: deps.fetchTranscript ?? ((videoId) => fetchTranscriptText(videoId)),
        generator: (deps.createGenerator ?? ((apiKey) => new OpenAIArticleGenerator(apiKey)))(env.apiKey),
        sleep: deps.sleep,
        onChunk: (chunk) => process.stdout.write(chunk),
        log,
      }
    );

    console.log(`✅ Article saved to: ${result.file}`);
    console.log(`  Title: ${result.article.title}`);
    console.log(`  Hashtags: ${result.article.hashtags.length ? result.article.hashtags.join(", ") : "None"}`);
  } catch (e) {
    log.error = describeError(e);
    throw e;
  } finally {
    try {
      const file = await flushRunLog(env.logsDir, log);
      console.log(`▶ Run log: ${file}`);
    } catch (e) {
      console.error(`⚠ Could not write run log: ${describeError(e)}`);
    }
  }
}

// Resolves to the process exit code; failures are reported on stderr.
export async function runCli(
  argv: string[] = process.argv.slice(2),
  envVars: NodeJS.ProcessEnv = process.env,
  deps: MainDeps = {}
): Promise<number> {
  try {
    await main(argv, envVars, deps);
    return 0;
  } catch (e) {
    console.error(`❌ ${describeError(e)}`);
    return 1;
  }
}

// CLI: tsx src/generate.ts --url-1 <url>
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli().then((code) => process.exit(code));
}
