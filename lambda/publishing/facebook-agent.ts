import { BasePublishingAgent, FormattedContent, PublishResult, SocialShare } from './base-publishing-agent';
import { SocialAccount } from '../workflow/types';
import { isRecord, readString } from '../utils/json';

const MAX_HASHTAGS = 3;

export class FacebookPublishingAgent extends BasePublishingAgent {
  readonly platform = 'facebook' as const;
  private readonly baseUrl = 'https://graph.facebook.com/v19.0';

  formatContent(share: SocialShare): FormattedContent {
    const hashtags = share.tags.map(tag => this.toHashtag(tag)).filter(Boolean).slice(0, MAX_HASHTAGS);
    const parts = [share.title, this.sanitizeContent(share.excerpt)];
    if (hashtags.length > 0) {
      parts.push(hashtags.join(' '));
    }

    return {
      title: share.title,
      body: parts.join('\n\n'),
      link: share.url,
      tags: hashtags,
      imageUrl: share.imageUrl,
    };
  }

  async publish(content: FormattedContent, account: SocialAccount): Promise<PublishResult> {
    try {
      this.validateRequiredCredentials(account, ['accessToken', 'accountId']);

      // Page feed posts; the link preview picks up the featured image
      const response = await fetch(`${this.baseUrl}/${encodeURIComponent(account.accountId)}/feed`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json',
        },
        body: JSON.stringify({
          message: content.body,
          link: content.link,
          access_token: account.accessToken,
        }),
      });

      if (!response.ok) {
        throw new Error(await this.readError(response));
      }

      const result: unknown = await response.json();
      const id = isRecord(result) ? readString(result, 'id') : '';
      if (!id) {
        throw new Error('facebook API returned no post id');
      }

      return {
        success: true,
        platformId: id,
        platformUrl: `https://www.facebook.com/${id}`,
      };
    } catch (error) {
      console.error(`Facebook publishing failed for page ${account.name}:`, error instanceof Error ? error.message : error);
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
      };
    }
  }
}
