import { FetchFailureError, InvalidReferenceError } from "./errors";

export type TranscriptSnippet = { text: string };

// Fetches caption snippets for one video; `lang` undefined means "any language".
export type TranscriptSource = (videoId: string, lang?: string) => Promise<TranscriptSnippet[]>;

export type FetchedTranscript = {
  videoId: string;
  text: string;
  snippetCount: number;
  language: string | null;
};

export const PREFERRED_LANGUAGES = ["en", "en-US", "en-GB"];

// Order matters: the first pattern that matches wins.
const VIDEO_ID_PATTERNS = [
  /(?:v=|\/)([0-9A-Za-z_-]{11}).*/,
  /(?:embed\/)([0-9A-Za-z_-]{11})/,
  /(?:youtu\.be\/)([0-9A-Za-z_-]{11})/,
];

const BARE_VIDEO_ID = /^[0-9A-Za-z_-]{11}$/;

function matchVideoId(pattern: RegExp, reference: string): string | null {
  const m = pattern.exec(reference);
  return m?.[1] ?? null;
}

export function extractVideoId(reference: string): string {
  const s = reference.trim();
  if (!s) throw new InvalidReferenceError(reference);

  for (const pattern of VIDEO_ID_PATTERNS) {
    const id = matchVideoId(pattern, reference);
    if (id) return id;
  }

  // Accept raw video id too
  if (BARE_VIDEO_ID.test(s)) return s;

  throw new InvalidReferenceError(reference);
}

export const youtubeTranscriptSource: TranscriptSource = async (videoId, lang) => {
  // Loaded lazily so that callers supplying their own source never touch the network client.
  const { YoutubeTranscript } = await import("youtube-transcript");
  const items = await YoutubeTranscript.fetchTranscript(videoId, lang ? { lang } : undefined);
  return items.map((x) => ({ text: x.text }));
};

/**
 * Fetches one transcript, trying each preferred language before falling back
 * to whatever language the video has. Snippets are joined with single spaces.
 */
export async function fetchTranscriptText(
  videoId: string,
  source: TranscriptSource = youtubeTranscriptSource,
  languages: string[] = PREFERRED_LANGUAGES
): Promise<FetchedTranscript> {
  const attempts: (string | undefined)[] = [...languages, undefined];
  let lastError: unknown = new Error("no transcript snippets returned");

  for (const lang of attempts) {
    try {
      const snippets = await source(videoId, lang);
      if (snippets.length === 0) continue;
      return {
        videoId,
        text: snippets.map((x) => x.text).join(" "),
        snippetCount: snippets.length,
        language: lang ?? null,
      };
    } catch (e) {
      lastError = e;
    }
  }

  throw new FetchFailureError(videoId, lastError);
}
