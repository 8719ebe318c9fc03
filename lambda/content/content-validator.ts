import defaultBlocklists from '../../config/language-blocklists.json';

export interface ValidationReport {
  isValid: boolean;
  errors: string[];
}

export interface ArticleDraft {
  title: string;
  excerpt: string;
  body: string;
  category: string;
}

export type LanguageBlocklists = Readonly<Record<string, readonly string[]>>;

export interface ContentValidatorOptions {
  language?: string;
  blocklists?: LanguageBlocklists;
}

type ValidationRule = (draft: ArticleDraft) => string[];

const TITLE_MIN = 10;
const TITLE_MAX = 60;
const EXCERPT_MIN = 20;
const EXCERPT_MAX = 160;
const MIN_H2 = 3;
const MIN_PARAGRAPHS = 8;
const MIN_WORDS = 800;
const MIN_CHARS = 4000;
const LANGUAGE_SAMPLE_CHARS = 500;

const FORBIDDEN_TITLE_CHARS = ['"', '“', '”', '„', ':', '{', '}', '[', ']'];

const CLICKBAIT_PATTERNS = [
  /\d+\s+(shocking|amazing|incredible|unbelievable)/,
  /you won't believe/,
  /doctors hate/,
  /this one trick/,
];

const SERIALIZATION_ARTIFACTS = ['"title":', '"excerpt":', '"content":', '{"', '"}'];
const BODY_ARTIFACTS = [...SERIALIZATION_ARTIFACTS, '\\"title\\":', '\\"content\\"'];
const PLACEHOLDERS = ['lorem ipsum', 'placeholder', 'TODO', 'XXX', '[insert', '{insert'];

export function stripMarkup(html: string): string {
  return html.replace(/<[^>]+>/g, '');
}

function countMatches(text: string, pattern: RegExp): number {
  return (text.match(pattern) ?? []).length;
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []);
}

/**
 * Rule-based quality gate for generated articles. Every rule runs
 * independently; a rule that throws is reported as a single error.
 */
export class ContentValidator {
  private readonly language: string;
  private readonly blocklists: LanguageBlocklists;
  private readonly rules: Array<[string, ValidationRule]>;

  constructor(options: ContentValidatorOptions = {}) {
    this.language = options.language ?? 'pl';
    this.blocklists = options.blocklists ?? defaultBlocklists;
    this.rules = [
      ['language', draft => this.validateLanguage(draft)],
      ['title', draft => this.validateTitle(draft)],
      ['excerpt', draft => this.validateExcerpt(draft)],
      ['body', draft => this.validateBody(draft)],
      ['structure', draft => this.validateStructure(draft)],
      ['length', draft => this.validateLength(draft)],
      ['format', draft => this.validateFormat(draft)],
    ];
  }

  validate(title: string, excerpt: string, body: string, category = ''): ValidationReport {
    const draft: ArticleDraft = { title, excerpt, body, category };
    const errors: string[] = [];

    for (const [name, rule] of this.rules) {
      try {
        errors.push(...rule(draft));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Validation rule ${name} failed:`, message);
        errors.push(`Validation rule ${name} failed: ${message}`);
      }
    }

    if (errors.length > 0) {
      console.warn(`Article "${title.substring(0, 50)}" failed validation with ${errors.length} issue(s)`);
    }

    return { isValid: errors.length === 0, errors };
  }

  /** Validator for another blog language sharing the same block-lists. */
  forLanguage(language: string): ContentValidator {
    return language === this.language
      ? this
      : new ContentValidator({ language, blocklists: this.blocklists });
  }

  private validateLanguage({ title, body }: ArticleDraft): string[] {
    const blocked = this.blocklists[this.language];
    if (!blocked || blocked.length === 0) {
      return [];
    }

    const blockedSet = new Set(blocked);
    const errors: string[] = [];

    const inTitle = [...words(title)].filter(word => blockedSet.has(word));
    if (inTitle.length > 0) {
      errors.push(`Title contains foreign words: ${inTitle.join(', ')}`);
    }

    const sample = stripMarkup(body.substring(0, LANGUAGE_SAMPLE_CHARS));
    const inBody = [...words(sample)].filter(word => blockedSet.has(word));
    if (inBody.length > 0) {
      errors.push(`Body contains foreign words: ${inBody.slice(0, 3).join(', ')}`);
    }

    return errors;
  }

  private validateTitle({ title }: ArticleDraft): string[] {
    const errors: string[] = [];

    if (title.length > TITLE_MAX) {
      errors.push(`Title too long: ${title.length} characters (max ${TITLE_MAX})`);
    }
    if (title.length < TITLE_MIN) {
      errors.push(`Title too short: ${title.length} characters (min ${TITLE_MIN})`);
    }

    for (const char of FORBIDDEN_TITLE_CHARS) {
      if (title.includes(char)) {
        errors.push(`Title contains forbidden character: ${char}`);
      }
    }

    const lowered = title.toLowerCase();
    if (CLICKBAIT_PATTERNS.some(pattern => pattern.test(lowered))) {
      errors.push('Title contains clickbait phrasing');
    }

    return errors;
  }

  private validateExcerpt({ excerpt, body }: ArticleDraft): string[] {
    const errors: string[] = [];

    if (excerpt.length > EXCERPT_MAX) {
      errors.push(`Excerpt too long: ${excerpt.length} characters (max ${EXCERPT_MAX})`);
    }
    if (excerpt.length < EXCERPT_MIN) {
      errors.push(`Excerpt too short: ${excerpt.length} characters (min ${EXCERPT_MIN})`);
    }

    for (const artifact of SERIALIZATION_ARTIFACTS) {
      if (excerpt.includes(artifact)) {
        errors.push(`Excerpt contains serialization artifact: ${artifact}`);
      }
    }

    const start = body.indexOf('<p>');
    if (start !== -1) {
      const end = body.indexOf('</p>');
      if (end > start + 3) {
        const firstParagraph = body.substring(start + 3, end).substring(0, EXCERPT_MAX);
        if (excerpt.trim() === firstParagraph.trim()) {
          errors.push('Excerpt duplicates the first paragraph');
        }
      }
    }

    return errors;
  }

  private validateBody({ body }: ArticleDraft): string[] {
    const errors: string[] = [];

    for (const artifact of BODY_ARTIFACTS) {
      if (body.includes(artifact)) {
        errors.push(`Body contains serialization artifact: ${artifact}`);
      }
    }

    const lowered = body.toLowerCase();
    for (const placeholder of PLACEHOLDERS) {
      if (lowered.includes(placeholder.toLowerCase())) {
        errors.push(`Body contains placeholder: ${placeholder}`);
      }
    }

    return errors;
  }

  private validateStructure({ body }: ArticleDraft): string[] {
    const errors: string[] = [];

    const headings = countMatches(body, /<h2[^>]*>/g);
    if (headings < MIN_H2) {
      errors.push(`Too few h2 headings: ${headings} (min ${MIN_H2})`);
    }

    const paragraphs = countMatches(body, /<p[^>]*>/g);
    if (paragraphs < MIN_PARAGRAPHS) {
      errors.push(`Too few paragraphs: ${paragraphs} (min ${MIN_PARAGRAPHS})`);
    }

    if (countOccurrences(body, '<p>') !== countOccurrences(body, '</p>')) {
      errors.push('Unbalanced <p> tags');
    }
    if (countOccurrences(body, '<h2>') !== countOccurrences(body, '</h2>')) {
      errors.push('Unbalanced <h2> tags');
    }

    return errors;
  }

  private validateLength({ body }: ArticleDraft): string[] {
    const errors: string[] = [];
    const text = stripMarkup(body);
    const wordCount = text.split(/\s+/).filter(Boolean).length;

    if (wordCount < MIN_WORDS) {
      errors.push(`Too few words: ${wordCount} (min ${MIN_WORDS})`);
    }
    if (text.length < MIN_CHARS) {
      errors.push(`Too few characters: ${text.length} (min ${MIN_CHARS})`);
    }

    return errors;
  }

  private validateFormat({ body }: ArticleDraft): string[] {
    const errors: string[] = [];
    const trimmed = body.trim();

    if (!trimmed.startsWith('<p')) {
      errors.push('Body must start with <p>');
    }
    if (!trimmed.endsWith('</p>')) {
      errors.push('Body must end with </p>');
    }
    if (body.includes('<p><h2>') || body.includes('<h2><p>')) {
      errors.push('Body nests <p> and <h2> tags');
    }

    return errors;
  }
}
