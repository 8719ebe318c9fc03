import { CompletionClient, isRejection } from '../ai/completion-client';
import { stripMarkup } from '../content/content-validator';
import { GenerationTimeoutError } from '../utils/error-handler';
import { isRecord, readString } from '../utils/json';
import { AttemptOutcome, errorMessage } from './result';
import { Blog, Topic } from './types';

export interface GeneratedContent {
  title: string;
  excerpt: string;
  body: string;
}

export interface GenerationRequest {
  topic: Topic;
  blog: Blog;
  targetWords: number;
}

export interface ContentGeneratorOptions {
  timeoutMs: number;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export const DEFAULT_TARGET_WORDS = 1600;
export const MIN_BODY_CHARS = 200;

const EXCERPT_LIMIT = 155;

const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  pl: 'Polish',
  en: 'English',
  de: 'German',
  cs: 'Czech',
};

// Completion endpoints sometimes answer with an error text or an HTML error page instead of failing
const ERROR_TEXT_PATTERN = /^(error|błąd|exception)\b|^(<!doctype html|<html)/i;

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

export function buildSystemPrompt(blog: Blog): string {
  return `You are an experienced editor of the blog "${blog.name}". You write original, factual articles in ${languageName(blog.language)} only and always answer with a single JSON object.`;
}

export function buildArticlePrompt({ topic, blog, targetWords }: GenerationRequest): string {
  const language = languageName(blog.language);
  const prompt = `
Write a complete blog article in ${language}.

TOPIC: "${topic.title}"
CATEGORY: ${topic.category}
TARGET LENGTH: about ${targetWords} words (never fewer than 800)

TITLE RULES:
- 10 to 60 characters
- No quotation marks, colons or brackets
- No clickbait

EXCERPT RULES:
- 20 to 160 characters
- A summary, not a copy of the first paragraph

ARTICLE STRUCTURE (HTML):
- Start with a <p> paragraph and end with a </p> paragraph
- At least 3 <h2> section headings
- At least 8 <p> paragraphs
- Never put <h2> inside <p> or <p> inside <h2>
- No placeholders, no notes to the editor

Every word must be in ${language}.

Respond with JSON only, in exactly this shape:
{"title": "...", "excerpt": "...", "content": "<p>...</p>"}
`;

  return prompt.trim();
}

/**
 * Pulls the JSON object out of a completion, tolerating code fences and text
 * around it. Returns null when no usable object is present.
 */
export function parseGeneratedContent(raw: string): GeneratedContent | null {
  const cleaned = raw.replace(/```(?:json|html)?/gi, '').trim();
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned.substring(start, end + 1));
  } catch (error) {
    console.warn('Completion did not contain valid JSON:', errorMessage(error));
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }

  const title = readString(parsed, 'title').trim();
  const body = (readString(parsed, 'content') || readString(parsed, 'body')).trim();
  let excerpt = readString(parsed, 'excerpt').trim();
  if (excerpt === '') {
    excerpt = stripMarkup(body).replace(/\s+/g, ' ').trim().substring(0, EXCERPT_LIMIT).trim();
  }

  return { title, excerpt, body };
}

export function looksLikeErrorText(raw: string): boolean {
  return ERROR_TEXT_PATTERN.test(raw.trim());
}

/**
 * Runs one generation attempt under a timeout. The timeout aborts the
 * in-flight completion call through its AbortSignal.
 */
export class ContentGenerator {
  constructor(
    private readonly completion: CompletionClient,
    private readonly options: ContentGeneratorOptions
  ) {}

  async attempt(request: GenerationRequest): Promise<AttemptOutcome<GeneratedContent>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // settle first so the abort rejection of the call cannot win the race
        reject(new GenerationTimeoutError(this.options.timeoutMs));
        controller.abort();
      }, this.options.timeoutMs);
    });

    let raw: string;
    try {
      raw = await Promise.race([
        this.completion.complete(
          {
            prompt: buildArticlePrompt(request),
            systemPrompt: buildSystemPrompt(request.blog),
            model: this.options.model,
            maxTokens: this.options.maxTokens ?? 8000,
            temperature: this.options.temperature ?? 0.7,
          },
          controller.signal
        ),
        timeout,
      ]);
    } catch (error) {
      if (error instanceof GenerationTimeoutError) {
        return { kind: 'retryable', reason: error.message };
      }
      if (error instanceof Error && isRejection(error)) {
        return { kind: 'fatal', reason: `Completion service rejected the request: ${error.message}` };
      }
      return { kind: 'retryable', reason: `Completion call failed: ${errorMessage(error)}` };
    } finally {
      clearTimeout(timer);
    }

    if (raw.trim() === '' || looksLikeErrorText(raw)) {
      return { kind: 'retryable', reason: 'Completion service returned no content' };
    }

    const content = parseGeneratedContent(raw);
    if (!content) {
      return { kind: 'retryable', reason: 'Completion output could not be parsed' };
    }
    if (content.title === '') {
      return { kind: 'retryable', reason: 'Generated article has no title' };
    }
    if (content.body.length < MIN_BODY_CHARS) {
      return { kind: 'retryable', reason: `Generated body too short: ${content.body.length} characters` };
    }

    return { kind: 'ok', value: content };
  }
}
