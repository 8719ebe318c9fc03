import { AuthorDirectory } from '../authors/roster-provider';
import { isRecord, JsonRecord, readNumber, readString } from '../utils/json';
import { Author, Blog } from '../workflow/types';

export interface CreatePostInput {
  title: string;
  content: string;
  excerpt: string;
  status: 'publish' | 'draft';
  authorId: number;
  categoryIds: number[];
  tagIds: number[];
  featuredMediaId?: number;
}

export interface CreatedPost {
  id: number;
  link: string;
}

/** The CMS operations publishing needs. */
export interface CmsClient {
  findCategoryId(name: string): Promise<number | null>;
  createOrFindTags(names: readonly string[]): Promise<number[]>;
  uploadMedia(bytes: Uint8Array, filename: string, mimeType: string): Promise<number>;
  createPost(input: CreatePostInput): Promise<CreatedPost>;
  listAuthors(): Promise<Author[]>;
}

export type CmsClientFactory = (blog: Blog) => CmsClient;

export type FetchFn = typeof fetch;

interface SendOptions {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string | Buffer;
}

export class CmsRequestError extends Error {
  constructor(readonly status: number, readonly path: string, readonly responseBody: string) {
    super(`WordPress API ${path} returned ${status}: ${responseBody.substring(0, 200)}`);
    this.name = 'CmsRequestError';
  }
}

function decodeEntities(text: string): string {
  return text
    .replace(/&amp;/g, '&')
    .replace(/&#039;/g, "'")
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>');
}

function sameName(a: string, b: string): boolean {
  return decodeEntities(a).trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * WordPress REST client authenticated with an application password over
 * HTTP basic auth. Every non-2xx answer raises a CmsRequestError.
 */
export class WordPressClient implements CmsClient {
  private readonly baseUrl: string;
  private readonly authorization: string;

  constructor(blog: Blog, private readonly fetchImpl: FetchFn = fetch) {
    this.baseUrl = blog.apiUrl.replace(/\/+$/, '');
    this.authorization = 'Basic ' + Buffer.from(`${blog.username}:${blog.apiToken}`).toString('base64');
  }

  async findCategoryId(name: string): Promise<number | null> {
    const categories = await this.getList(`/wp/v2/categories?search=${encodeURIComponent(name)}&per_page=100`);
    const match = categories.find(category => sameName(readString(category, 'name'), name));
    return match ? readNumber(match, 'id') : null;
  }

  async createOrFindTags(names: readonly string[]): Promise<number[]> {
    const ids: number[] = [];
    for (const name of names) {
      const existing = await this.getList(`/wp/v2/tags?search=${encodeURIComponent(name)}&per_page=100`);
      const match = existing.find(tag => sameName(readString(tag, 'name'), name));
      if (match) {
        ids.push(readNumber(match, 'id'));
        continue;
      }
      ids.push(await this.createTag(name));
    }
    return ids;
  }

  async uploadMedia(bytes: Uint8Array, filename: string, mimeType: string): Promise<number> {
    const media = await this.request('/wp/v2/media', {
      method: 'POST',
      headers: {
        'Content-Type': mimeType,
        'Content-Disposition': `attachment; filename="${filename.replace(/"/g, '')}"`,
      },
      body: Buffer.from(bytes),
    });
    return readNumber(media, 'id');
  }

  async createPost(input: CreatePostInput): Promise<CreatedPost> {
    const payload: Record<string, unknown> = {
      title: input.title,
      content: input.content,
      excerpt: input.excerpt,
      status: input.status,
      author: input.authorId,
      categories: input.categoryIds,
      tags: input.tagIds,
    };
    if (input.featuredMediaId !== undefined) {
      payload.featured_media = input.featuredMediaId;
    }

    const post = await this.request('/wp/v2/posts', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    const id = readNumber(post, 'id', Number.NaN);
    if (!Number.isInteger(id)) {
      throw new CmsRequestError(200, '/wp/v2/posts', 'response did not contain a post id');
    }
    return { id, link: readString(post, 'link') };
  }

  async listAuthors(): Promise<Author[]> {
    const users = await this.getList('/wp/v2/users?per_page=100');
    return users
      .map(user => ({
        id: readNumber(user, 'id'),
        name: readString(user, 'name') || readString(user, 'slug'),
        specialties: [],
        weight: 10,
      }))
      .filter(author => author.id > 0);
  }

  private async createTag(name: string): Promise<number> {
    try {
      const tag = await this.request('/wp/v2/tags', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ name }),
      });
      return readNumber(tag, 'id');
    } catch (error) {
      // a concurrent run may have created the tag since the lookup
      if (error instanceof CmsRequestError && error.status === 400) {
        const termId = existingTermId(error.responseBody);
        if (termId !== null) {
          return termId;
        }
      }
      throw error;
    }
  }

  private async getList(path: string): Promise<JsonRecord[]> {
    const response = await this.send(path, { method: 'GET' });
    const body: unknown = await response.json();
    return Array.isArray(body) ? body.filter(isRecord) : [];
  }

  private async request(path: string, init: SendOptions): Promise<JsonRecord> {
    const response = await this.send(path, init);
    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new CmsRequestError(response.status, path, 'response was not a JSON object');
    }
    return body;
  }

  private async send(path: string, init: SendOptions): Promise<Response> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: init.method,
      body: init.body,
      headers: {
        ...init.headers,
        'Authorization': this.authorization,
        'Accept': 'application/json',
      },
    });

    if (!response.ok) {
      throw new CmsRequestError(response.status, path.split('?')[0], await response.text());
    }
    return response;
  }
}

function existingTermId(responseBody: string): number | null {
  try {
    const parsed: unknown = JSON.parse(responseBody);
    if (isRecord(parsed) && readString(parsed, 'code') === 'term_exists' && isRecord(parsed.data)) {
      const termId = readNumber(parsed.data, 'term_id', Number.NaN);
      return Number.isInteger(termId) ? termId : null;
    }
  } catch (error) {
    console.warn('Unparseable WordPress error body:', error instanceof Error ? error.message : String(error));
  }
  return null;
}

export const wordPressClientFactory: CmsClientFactory = blog => new WordPressClient(blog);

/** Lists CMS users so blogs without a configured roster still rotate authors. */
export class CmsAuthorDirectory implements AuthorDirectory {
  constructor(private readonly factory: CmsClientFactory = wordPressClientFactory) {}

  async listAuthors(blog: Blog): Promise<Author[]> {
    return this.factory(blog).listAuthors();
  }
}
