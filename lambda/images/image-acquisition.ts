import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import sharp from 'sharp';
import { errorMessage } from '../workflow/result';
import { StoredImage } from '../workflow/types';
import { ImageCandidate, ImageProvider } from './image-providers';

export const MAX_ARTICLE_IMAGES = 3;

const MAX_DIMENSION = 1600;
const JPEG_QUALITY = 82;

export interface ImageRequest {
  articleId: string;
  blogId: string;
  title: string;
  category: string;
}

/** What the workflow needs from image handling. */
export interface ImageAcquirer {
  acquire(request: ImageRequest, limit?: number): Promise<StoredImage[]>;
  loadImageBytes(image: StoredImage): Promise<Uint8Array>;
}

export interface ImageAcquisitionOptions {
  bucketName: string;
  providers: ImageProvider[];
  s3Client?: S3Client;
  fetchImpl?: typeof fetch;
}

/**
 * Searches the configured providers in order, then downloads, optimizes and
 * stores each hit in S3. Individual failures are skipped.
 */
export class ImageAcquisitionService implements ImageAcquirer {
  private readonly s3Client: S3Client;
  private readonly bucketName: string;
  private readonly providers: ImageProvider[];
  private readonly fetchImpl: typeof fetch;

  constructor(options: ImageAcquisitionOptions) {
    this.s3Client = options.s3Client ?? new S3Client({ region: process.env.AWS_REGION });
    this.bucketName = options.bucketName;
    this.providers = options.providers;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async acquire(request: ImageRequest, limit: number = MAX_ARTICLE_IMAGES): Promise<StoredImage[]> {
    const candidates = await this.findCandidates(request, limit);
    const stored: StoredImage[] = [];

    for (const [index, candidate] of candidates.entries()) {
      try {
        stored.push(await this.optimizeAndStore(candidate, request, index));
      } catch (error) {
        console.warn(`Skipping image ${candidate.url}:`, errorMessage(error));
      }
    }

    console.log(`Stored ${stored.length} image(s) for article ${request.articleId}`);
    return stored;
  }

  async loadImageBytes(image: StoredImage): Promise<Uint8Array> {
    const response = await this.s3Client.send(new GetObjectCommand({
      Bucket: this.bucketName,
      Key: image.key,
    }));
    if (!response.Body) {
      throw new Error(`Image ${image.key} has no body`);
    }
    return response.Body.transformToByteArray();
  }

  private async findCandidates(request: ImageRequest, limit: number): Promise<ImageCandidate[]> {
    const found: ImageCandidate[] = [];
    const queries = [request.title, request.category].filter(query => query.trim() !== '');

    for (const query of queries) {
      for (const provider of this.providers) {
        if (found.length >= limit) {
          return found;
        }
        try {
          const results = await provider.search(query, limit, 'landscape');
          for (const result of results) {
            if (found.length < limit && !found.some(existing => existing.url === result.url)) {
              found.push(result);
            }
          }
        } catch (error) {
          console.warn(`Image search on ${provider.name} failed for "${query}":`, errorMessage(error));
        }
      }
    }

    return found;
  }

  private async optimizeAndStore(candidate: ImageCandidate, request: ImageRequest, index: number): Promise<StoredImage> {
    const response = await this.fetchImpl(candidate.url);
    if (!response.ok) {
      throw new Error(`Failed to download image: ${response.status} ${response.statusText}`);
    }
    const original = Buffer.from(await response.arrayBuffer());

    const optimized = await sharp(original)
      .resize(MAX_DIMENSION, MAX_DIMENSION, { fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();
    const info = await sharp(optimized).metadata();

    const key = `images/${request.blogId}/${request.articleId}/${index + 1}-${Date.now()}.jpg`;
    await this.s3Client.send(new PutObjectCommand({
      Bucket: this.bucketName,
      Key: key,
      Body: optimized,
      ContentType: 'image/jpeg',
      Metadata: {
        articleId: request.articleId,
        source: candidate.source,
      },
    }));

    return {
      key,
      url: `https://${this.bucketName}.s3.amazonaws.com/${key}`,
      sourceUrl: candidate.pageUrl || candidate.url,
      source: candidate.source,
      attribution: candidate.attribution,
      width: info.width ?? candidate.width,
      height: info.height ?? candidate.height,
    };
  }
}
