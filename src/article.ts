import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

export type GeneratedArticle = {
  title: string;
  body: string;
  hashtags: string[];
};

const TITLE_LINE = /^TITLE:\s*(.+)$/m;
// Marker plus the rest of its line (or the next non-blank line when the marker
// ends its own line). A bare trailing marker is not a match. Anything after
// the captured line stays in the body.
const HASHTAGS_LINE = /HASHTAGS:\s*(.+)$/m;
const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const MAX_FILENAME_LENGTH = 100;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function defaultTitle(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `Article_${date}_${time}`;
}

export function parseArticleResponse(raw: string, now: Date = new Date()): GeneratedArticle {
  let title: string | null = null;
  let body = raw.trim();
  let hashtags: string[] = [];

  const titleMatch = TITLE_LINE.exec(body);
  if (titleMatch) {
    title = titleMatch[1].trim() || null;
    body = (body.slice(0, titleMatch.index) + body.slice(titleMatch.index + titleMatch[0].length)).trim();
  }

  const hashtagsMatch = HASHTAGS_LINE.exec(body);
  if (hashtagsMatch) {
    hashtags = hashtagsMatch[1].split(/\s+/).filter((tag) => tag.length > 0);
    body = (body.slice(0, hashtagsMatch.index) + body.slice(hashtagsMatch.index + hashtagsMatch[0].length)).trim();
  }

  return { title: title ?? defaultTitle(now), body, hashtags };
}

export function sanitizeFilename(title: string): string {
  const filename = title.replace(INVALID_FILENAME_CHARS, "").replace(/\s+/g, "_");
  const chars = Array.from(filename);
  return chars.length > MAX_FILENAME_LENGTH ? chars.slice(0, MAX_FILENAME_LENGTH).join("") : filename;
}

export function formatArticle(article: GeneratedArticle): string {
  let text = `# ${article.title}\n\n${article.body}`;
  if (article.hashtags.length > 0) {
    text += `\n\n---\n\n**Hashtags:** ${article.hashtags.join(" ")}\n`;
  }
  return text;
}

// Overwrites an existing file with the same sanitized title.
export async function saveArticle(dir: string, article: GeneratedArticle): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, `${sanitizeFilename(article.title)}.md`);
  await writeFile(file, formatArticle(article), "utf-8");
  return file;
}
