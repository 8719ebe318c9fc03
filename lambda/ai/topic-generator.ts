import { languageName } from '../workflow/content-generator';
import { errorMessage } from '../workflow/result';
import { TopicSource } from '../workflow/topic-selector';
import { Blog } from '../workflow/types';
import { CompletionClient } from './completion-client';

const MAX_TITLE_LENGTH = 60;

/**
 * Reads topic titles out of a completion: a JSON array of strings when there
 * is one, otherwise one title per line with list markers stripped.
 */
export function parseTopicTitles(raw: string, limit: number): string[] {
  const cleaned = raw.replace(/```(?:json)?/gi, '').trim();
  let titles: string[] = [];

  const start = cleaned.indexOf('[');
  const end = cleaned.lastIndexOf(']');
  if (start !== -1 && end > start) {
    try {
      const parsed: unknown = JSON.parse(cleaned.substring(start, end + 1));
      if (Array.isArray(parsed)) {
        titles = parsed.filter((item): item is string => typeof item === 'string');
      }
    } catch (error) {
      console.warn('Topic list was not valid JSON, falling back to lines:', errorMessage(error));
    }
  }

  if (titles.length === 0) {
    titles = cleaned
      .split('\n')
      .map(line => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, ''));
  }

  const seen = new Set<string>();
  return titles
    .map(title => title.trim().replace(/^["'„“”]+|["'„“”]+$/g, '').trim())
    .filter(title => {
      const key = title.toLowerCase();
      if (title === '' || title.length > MAX_TITLE_LENGTH || seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    })
    .slice(0, limit);
}

export class TopicGenerator implements TopicSource {
  constructor(private readonly completion: CompletionClient, private readonly model?: string) {}

  async generateTopics(category: string, count: number, blog: Blog): Promise<string[]> {
    const language = languageName(blog.language);
    const prompt = `
Suggest ${count} distinct blog article topics for the category "${category}" of the blog "${blog.name}".

REQUIREMENTS:
- Written in ${language}
- Each title 10 to 60 characters, without colons or quotation marks
- Practical and specific, no clickbait

Respond with a JSON array of ${count} strings and nothing else.
`.trim();

    const raw = await this.completion.complete({
      prompt,
      systemPrompt: `You plan editorial calendars for ${language}-language blogs.`,
      model: this.model,
      maxTokens: 1000,
      temperature: 0.8,
    });

    const titles = parseTopicTitles(raw, count);
    console.log(`Generated ${titles.length} topic(s) for category ${category}`);
    return titles;
  }
}
