import { SocialAccount, SocialPlatform } from '../workflow/types';

/** What a published article looks like to a social channel. */
export interface SocialShare {
  title: string;
  excerpt: string;
  url: string;
  tags: string[];
  imageUrl?: string;
}

export interface PublishResult {
  success: boolean;
  platformUrl?: string;
  platformId?: string;
  error?: string;
}

export interface FormattedContent {
  title: string;
  body: string;
  link: string;
  tags: string[];
  imageUrl?: string;
}

export interface PublishingAgent {
  readonly platform: SocialPlatform;

  formatContent(share: SocialShare): FormattedContent;
  publish(content: FormattedContent, account: SocialAccount): Promise<PublishResult>;
}

export abstract class BasePublishingAgent implements PublishingAgent {
  abstract readonly platform: SocialPlatform;

  abstract formatContent(share: SocialShare): FormattedContent;
  abstract publish(content: FormattedContent, account: SocialAccount): Promise<PublishResult>;

  protected validateRequiredCredentials(account: SocialAccount, requiredFields: Array<'accessToken' | 'accountId'>): void {
    for (const field of requiredFields) {
      if (!account[field]) {
        throw new Error(`Missing required credential: ${field}`);
      }
    }
  }

  protected sanitizeContent(content: string): string {
    return content
      .replace(/<script[^>]*>.*?<\/script>/gi, '')
      .replace(/<iframe[^>]*>.*?<\/iframe>/gi, '')
      .replace(/<[^>]+>/g, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /** Hashtag form of an SEO tag: letters and digits only, camel-cased across words. */
  protected toHashtag(tag: string): string {
    const words = tag.split(/[^\p{L}\p{N}]+/u).filter(Boolean);
    if (words.length === 0) {
      return '';
    }
    return '#' + words.map((word, index) => (index === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1))).join('');
  }

  protected async readError(response: Response): Promise<string> {
    const text = await response.text();
    return `${this.platform} API error: ${response.status} - ${text.substring(0, 300)}`;
  }
}
