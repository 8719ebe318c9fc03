import seoTagConfig from '../../config/seo-tags.json';
import { stripMarkup } from './content-validator';

export const SEO_TAG_COUNT = 12;

const MAX_KEYWORD_TAGS = 8;
const MIN_TAG_LENGTH = 3;
const MIN_KEYWORD_LENGTH = 4;

export interface SeoTagVocabulary {
  categoryBaseTags: Readonly<Record<string, readonly string[]>>;
  defaultBaseTags: readonly string[];
  fallbackTags: readonly string[];
  stopWords: readonly string[];
}

export class SeoTagGenerator {
  private readonly vocabulary: SeoTagVocabulary;
  private readonly stopWords: ReadonlySet<string>;

  constructor(vocabulary: SeoTagVocabulary = seoTagConfig) {
    if (new Set(vocabulary.fallbackTags).size < SEO_TAG_COUNT) {
      throw new Error(`SEO vocabulary needs at least ${SEO_TAG_COUNT} distinct fallback tags`);
    }
    this.vocabulary = vocabulary;
    this.stopWords = new Set(vocabulary.stopWords);
  }

  /**
   * Exactly twelve unique lower-case tags: category base tags, then the most
   * frequent keywords of the article, then fallbacks. When there are more
   * than twelve candidates, tags that appear in the title go first.
   */
  generate(title: string, body: string, category: string): string[] {
    const base = this.vocabulary.categoryBaseTags[category] ?? this.vocabulary.defaultBaseTags;
    let tags = this.unique([...base, ...this.extractKeywords(title, body)]);

    if (tags.length > SEO_TAG_COUNT) {
      const loweredTitle = title.toLowerCase();
      const inTitle = tags.filter(tag => loweredTitle.includes(tag));
      const rest = tags.filter(tag => !loweredTitle.includes(tag));
      tags = [...inTitle, ...rest].slice(0, SEO_TAG_COUNT);
    }

    for (const fallback of this.vocabulary.fallbackTags) {
      if (tags.length >= SEO_TAG_COUNT) {
        break;
      }
      if (!tags.includes(fallback)) {
        tags.push(fallback);
      }
    }

    return tags;
  }

  private extractKeywords(title: string, body: string): string[] {
    const text = `${title} ${stripMarkup(body)}`.toLowerCase();
    const counts = new Map<string, number>();

    for (const word of text.match(/[\p{L}\p{N}]+/gu) ?? []) {
      if (word.length < MIN_KEYWORD_LENGTH || this.stopWords.has(word) || /^\d+$/.test(word)) {
        continue;
      }
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    // Map iteration keeps first-occurrence order, so the sort is stable on ties
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_KEYWORD_TAGS)
      .map(([word]) => word);
  }

  private unique(candidates: readonly string[]): string[] {
    const seen = new Set<string>();
    const tags: string[] = [];
    for (const candidate of candidates) {
      const tag = candidate.trim().toLowerCase();
      if (tag.length >= MIN_TAG_LENGTH && !seen.has(tag)) {
        seen.add(tag);
        tags.push(tag);
      }
    }
    return tags;
  }
}
