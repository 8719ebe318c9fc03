import { errorMessage } from '../workflow/result';
import { Article, Author, Blog } from '../workflow/types';
import { FALLBACK_AUTHOR, RosterProvider, topicSeed } from './roster-provider';

const DAY_MS = 86_400_000;
const SPECIALIST_PREFERENCE_PERCENT = 80;
const BALANCE_TOLERANCE_PERCENT = 20;

/** Read side of the article store the rotation needs. */
export interface PublicationLog {
  listPublishedArticles(blogId: string, since: Date): Promise<Article[]>;
}

export interface AuthorShare {
  authorId: number;
  name: string;
  count: number;
  percentage: number;
}

export interface AuthorDistribution {
  blogName: string;
  totalArticles: number;
  daysAnalyzed: number;
  authors: AuthorShare[];
  balanced: boolean;
}

export interface ScheduledSlot {
  order: number;
  authorId: number;
  authorName: string;
  category: string;
}

export function dayOrdinal(now: Date): number {
  return Math.floor(now.getTime() / DAY_MS);
}

export function startOfUtcDay(now: Date): Date {
  return new Date(dayOrdinal(now) * DAY_MS);
}

/**
 * Builds a weighted pool where each author appears max(1, weight / 10) times
 * and picks the entry at seed mod pool size.
 */
export function pickWeighted(authors: readonly Author[], seed: number): Author {
  const pool: Author[] = [];
  for (const author of authors) {
    const copies = Math.max(1, Math.floor(author.weight / 10));
    for (let i = 0; i < copies; i++) {
      pool.push(author);
    }
  }
  return pool[Math.abs(seed) % pool.length];
}

export function isBalanced(percentages: readonly number[]): boolean {
  if (percentages.length === 0) {
    return true;
  }
  const mean = percentages.reduce((sum, value) => sum + value, 0) / percentages.length;
  return percentages.every(value => Math.abs(value - mean) <= BALANCE_TOLERANCE_PERCENT);
}

export class AuthorRotationManager {
  constructor(
    private readonly rosters: RosterProvider,
    private readonly publications: PublicationLog,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * First quota author who has not published today, otherwise round-robin
   * over the quota roster by the number of articles published today.
   */
  async nextAuthor(blog: Blog, dailyQuota: number): Promise<Author | null> {
    try {
      const quotaRoster = await this.quotaRoster(blog, dailyQuota);
      if (quotaRoster.length === 0) {
        return null;
      }

      const publishedToday = await this.publishedToday(blog);
      const counts = countByAuthor(publishedToday);

      const fresh = quotaRoster.find(author => !counts.has(author.id));
      if (fresh) {
        console.log(`Selected author ${fresh.name} (${fresh.id}) for blog ${blog.name}`);
        return fresh;
      }

      const cycled = quotaRoster[publishedToday.length % quotaRoster.length];
      console.log(`Cycling to author ${cycled.name} (${cycled.id}) for blog ${blog.name}`);
      return cycled;
    } catch (error) {
      console.error(`Author rotation failed for blog ${blog.name}, using fallback:`, errorMessage(error));
      return FALLBACK_AUTHOR;
    }
  }

  /**
   * Deterministic pick for a calendar day and slot. Goes through the same
   * roster lookup as every other selection, so a cold provider loads first.
   */
  async rotationalAuthor(blog: Blog, articleIndex: number): Promise<Author | null> {
    const roster = await this.rosters.rosterFor(blog);
    if (roster.length === 0) {
      return null;
    }
    const index = (dayOrdinal(this.now()) + articleIndex) % roster.length;
    return roster[(index + roster.length) % roster.length];
  }

  async distributionStats(blog: Blog, days = 7): Promise<AuthorDistribution> {
    const since = new Date(this.now().getTime() - days * DAY_MS);
    const [roster, articles] = await Promise.all([
      this.rosters.rosterFor(blog),
      this.publications.listPublishedArticles(blog.id, since),
    ]);

    const names = new Map(roster.map(author => [author.id, author.name]));
    const total = articles.length;
    const authors: AuthorShare[] = [...countByAuthor(articles).entries()].map(([authorId, count]) => ({
      authorId,
      name: names.get(authorId) ?? `Author ${authorId}`,
      count,
      percentage: total > 0 ? Math.round((count / total) * 1000) / 10 : 0,
    }));

    return {
      blogName: blog.name,
      totalArticles: total,
      daysAnalyzed: days,
      authors,
      balanced: isBalanced(authors.map(share => share.percentage)),
    };
  }

  /**
   * Author for a concrete article. Candidates are the quota authors with
   * nothing published today (or the round-robin author once everyone has
   * published). Category specialists are preferred when the topic seed falls
   * in the first 80 of every 100 values, then a weighted pool is indexed by
   * the seed.
   */
  async selectPublishingAuthor(blog: Blog, dailyQuota: number, category: string, topicId: string): Promise<Author> {
    try {
      const quotaRoster = await this.quotaRoster(blog, dailyQuota);
      if (quotaRoster.length === 0) {
        return FALLBACK_AUTHOR;
      }

      const publishedToday = await this.publishedToday(blog);
      const counts = countByAuthor(publishedToday);
      const fresh = quotaRoster.filter(author => !counts.has(author.id));
      const candidates = fresh.length > 0
        ? fresh
        : [quotaRoster[publishedToday.length % quotaRoster.length]];

      const seed = topicSeed(topicId);
      const wanted = category.trim().toLowerCase();
      const specialists = candidates.filter(author =>
        author.specialties.some(specialty => specialty.trim().toLowerCase() === wanted)
      );
      const preferSpecialists = specialists.length > 0 && seed % 100 < SPECIALIST_PREFERENCE_PERCENT;
      const author = pickWeighted(preferSpecialists ? specialists : candidates, seed);

      console.log(`Publishing author for topic ${topicId}: ${author.name} (${author.id})${preferSpecialists ? ' [specialist]' : ''}`);
      return author;
    } catch (error) {
      console.error(`Author selection failed for blog ${blog.name}, using fallback:`, errorMessage(error));
      return FALLBACK_AUTHOR;
    }
  }

  /** One slot per quota author, each paired with a category in rule order. */
  async dailySchedule(blog: Blog, dailyQuota: number, categories: readonly string[]): Promise<ScheduledSlot[]> {
    const quotaRoster = await this.quotaRoster(blog, dailyQuota);
    return quotaRoster.map((author, index) => ({
      order: index + 1,
      authorId: author.id,
      authorName: author.name,
      category: categories.length > 0 ? categories[index % categories.length] : 'General',
    }));
  }

  private async quotaRoster(blog: Blog, dailyQuota: number): Promise<readonly Author[]> {
    const roster = await this.rosters.rosterFor(blog);
    return roster.slice(0, Math.max(1, dailyQuota));
  }

  private async publishedToday(blog: Blog): Promise<Article[]> {
    return this.publications.listPublishedArticles(blog.id, startOfUtcDay(this.now()));
  }
}

function countByAuthor(articles: readonly Article[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const article of articles) {
    if (article.authorId !== undefined) {
      counts.set(article.authorId, (counts.get(article.authorId) ?? 0) + 1);
    }
  }
  return counts;
}
