import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../workflow/result';
import { Author, Blog } from '../workflow/types';
import { isRecord, readNumber, readString, readStringArray } from '../utils/json';

export type RosterSnapshot = ReadonlyMap<string, readonly Author[]>;

/** Source of CMS users for blogs that have no configured roster. */
export interface AuthorDirectory {
  listAuthors(blog: Blog): Promise<Author[]>;
}

export type RosterLoader = () => Promise<unknown>;

export interface RosterProviderOptions {
  loader?: RosterLoader;
  directory?: AuthorDirectory;
  refreshIntervalMs?: number;
  clock?: () => number;
}

export const ROSTER_REFRESH_INTERVAL_MS = 6 * 60 * 60 * 1000;
export const DEFAULT_ROSTER_PATH = path.resolve(__dirname, '../../config/authors.json');

export const FALLBACK_AUTHOR: Readonly<Author> = Object.freeze({
  id: 1,
  name: 'admin',
  specialties: [],
  weight: 10,
});

const FALLBACK_ROSTER: readonly Author[] = Object.freeze([FALLBACK_AUTHOR]);

export function rosterKey(blogName: string): string {
  return blogName.trim().toLowerCase();
}

/**
 * Stable numeric seed for a topic id. Numeric ids are used as-is, anything
 * else is hashed so the same id always maps to the same seed.
 */
export function topicSeed(topicId: string): number {
  if (/^\d+$/.test(topicId)) {
    return Number.parseInt(topicId, 10);
  }
  return Number.parseInt(createHash('sha256').update(topicId).digest('hex').slice(0, 8), 16);
}

function parseAuthor(value: unknown): Author | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = readNumber(value, 'id', Number.NaN);
  const name = readString(value, 'name');
  if (!Number.isInteger(id) || id <= 0 || name === '') {
    return null;
  }
  return Object.freeze({
    id,
    name,
    specialties: readStringArray(value, 'specialties'),
    weight: Math.max(1, readNumber(value, 'weight', 10)),
  });
}

export function parseRosterConfig(raw: unknown): RosterSnapshot {
  const rosters = new Map<string, readonly Author[]>();
  if (!isRecord(raw) || !isRecord(raw.rosters)) {
    throw new Error('Roster configuration must contain a "rosters" object');
  }

  for (const [blogName, entries] of Object.entries(raw.rosters)) {
    const authors = (Array.isArray(entries) ? entries : [])
      .map(parseAuthor)
      .filter((author): author is Author => author !== null);
    if (authors.length > 0) {
      rosters.set(rosterKey(blogName), Object.freeze(authors));
    }
  }

  return rosters;
}

async function readRosterFile(): Promise<unknown> {
  const file = process.env.ROSTER_CONFIG_PATH ?? DEFAULT_ROSTER_PATH;
  return JSON.parse(await readFile(file, 'utf-8'));
}

/**
 * Holds an immutable snapshot of per-blog author rosters. The snapshot is
 * replaced wholesale on refresh and when a roster is fetched lazily from the
 * CMS; callers never see it mutate.
 */
export class RosterProvider {
  private readonly loader: RosterLoader;
  private readonly directory?: AuthorDirectory;
  private readonly refreshIntervalMs: number;
  private readonly clock: () => number;
  private current: RosterSnapshot = new Map();
  private refreshedAt: number | null = null;

  constructor(options: RosterProviderOptions = {}) {
    this.loader = options.loader ?? readRosterFile;
    this.directory = options.directory;
    this.refreshIntervalMs = options.refreshIntervalMs ?? ROSTER_REFRESH_INTERVAL_MS;
    this.clock = options.clock ?? Date.now;
  }

  /** Provider with the configured rosters already loaded. */
  static async create(options: RosterProviderOptions = {}): Promise<RosterProvider> {
    const provider = new RosterProvider(options);
    await provider.refresh();
    return provider;
  }

  /**
   * Reloads the configured rosters. A failed reload keeps the previous
   * snapshot in place.
   */
  async refresh(): Promise<void> {
    try {
      this.current = parseRosterConfig(await this.loader());
      console.log(`Loaded author rosters for ${this.current.size} blog(s)`);
    } catch (error) {
      console.error('Failed to load author rosters:', errorMessage(error));
    }
    this.refreshedAt = this.clock();
  }

  async ensureFresh(): Promise<void> {
    if (this.refreshedAt === null || this.clock() - this.refreshedAt >= this.refreshIntervalMs) {
      await this.refresh();
    }
  }

  snapshot(): RosterSnapshot {
    return this.current;
  }

  async rosterFor(blog: Blog): Promise<readonly Author[]> {
    await this.ensureFresh();

    const key = rosterKey(blog.name);
    const configured = this.current.get(key);
    if (configured) {
      return configured;
    }

    if (!this.directory) {
      console.warn(`No author roster configured for blog ${blog.name}, using fallback author`);
      return FALLBACK_ROSTER;
    }

    try {
      const fetched = await this.directory.listAuthors(blog);
      if (fetched.length === 0) {
        console.warn(`CMS returned no authors for blog ${blog.name}, using fallback author`);
        return FALLBACK_ROSTER;
      }
      const roster = Object.freeze(fetched.map(author => Object.freeze({ ...author })));
      const next = new Map(this.current);
      next.set(key, roster);
      this.current = next;
      console.log(`Loaded ${roster.length} author(s) for blog ${blog.name} from the CMS`);
      return roster;
    } catch (error) {
      console.error(`Failed to load authors for blog ${blog.name}:`, errorMessage(error));
      return FALLBACK_ROSTER;
    }
  }
}
