import { isRecord, JsonRecord, readNumber, readRecordArray, readString } from '../utils/json';

export type ImageOrientation = 'landscape' | 'portrait' | 'squarish';

export interface ImageCandidate {
  url: string;
  pageUrl: string;
  width: number;
  height: number;
  attribution: string;
  source: string;
}

export interface ImageProvider {
  readonly name: string;
  search(query: string, perPage: number, orientation: ImageOrientation): Promise<ImageCandidate[]>;
}

type FetchFn = typeof fetch;

async function getJson(fetchImpl: FetchFn, url: string, headers: Record<string, string>, provider: string): Promise<JsonRecord> {
  const response = await fetchImpl(url, { headers: { ...headers, 'Accept': 'application/json' } });
  if (!response.ok) {
    throw new Error(`${provider} search failed: ${response.status} ${response.statusText}`);
  }
  const body: unknown = await response.json();
  if (!isRecord(body)) {
    throw new Error(`${provider} search returned an unexpected payload`);
  }
  return body;
}

function child(record: JsonRecord, key: string): JsonRecord {
  const value = record[key];
  return isRecord(value) ? value : {};
}

export class PexelsImageProvider implements ImageProvider {
  readonly name = 'pexels';
  private readonly baseUrl = 'https://api.pexels.com/v1';

  constructor(private readonly apiKey: string, private readonly fetchImpl: FetchFn = fetch) {}

  async search(query: string, perPage: number, orientation: ImageOrientation): Promise<ImageCandidate[]> {
    const params = new URLSearchParams({
      query,
      per_page: String(perPage),
      // Pexels calls the squarish orientation "square"
      orientation: orientation === 'squarish' ? 'square' : orientation,
    });
    const body = await getJson(this.fetchImpl, `${this.baseUrl}/search?${params}`, { 'Authorization': this.apiKey }, 'Pexels');

    return readRecordArray(body, 'photos')
      .map(photo => {
        const src = child(photo, 'src');
        return {
          url: readString(src, 'large2x') || readString(src, 'original'),
          pageUrl: readString(photo, 'url'),
          width: readNumber(photo, 'width'),
          height: readNumber(photo, 'height'),
          attribution: `Photo by ${readString(photo, 'photographer', 'unknown')} on Pexels`,
          source: this.name,
        };
      })
      .filter(candidate => candidate.url !== '');
  }
}

export class UnsplashImageProvider implements ImageProvider {
  readonly name = 'unsplash';
  private readonly baseUrl = 'https://api.unsplash.com';

  constructor(private readonly accessKey: string, private readonly fetchImpl: FetchFn = fetch) {}

  async search(query: string, perPage: number, orientation: ImageOrientation): Promise<ImageCandidate[]> {
    const params = new URLSearchParams({ query, per_page: String(perPage), orientation });
    const body = await getJson(
      this.fetchImpl,
      `${this.baseUrl}/search/photos?${params}`,
      { 'Authorization': `Client-ID ${this.accessKey}`, 'Accept-Version': 'v1' },
      'Unsplash'
    );

    return readRecordArray(body, 'results')
      .map(result => ({
        url: readString(child(result, 'urls'), 'regular'),
        pageUrl: readString(child(result, 'links'), 'html'),
        width: readNumber(result, 'width'),
        height: readNumber(result, 'height'),
        attribution: `Photo by ${readString(child(result, 'user'), 'name', 'unknown')} on Unsplash`,
        source: this.name,
      }))
      .filter(candidate => candidate.url !== '');
  }
}
