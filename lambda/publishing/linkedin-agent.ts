import { BasePublishingAgent, FormattedContent, PublishResult, SocialShare } from './base-publishing-agent';
import { SocialAccount } from '../workflow/types';
import { isRecord, readString } from '../utils/json';

interface LinkedInPost {
  author: string;
  lifecycleState: 'PUBLISHED';
  specificContent: {
    'com.linkedin.ugc.ShareContent': {
      shareCommentary: {
        text: string;
      };
      shareMediaCategory: 'ARTICLE';
      media: Array<{
        status: 'READY';
        originalUrl: string;
        title: {
          text: string;
        };
        description: {
          text: string;
        };
      }>;
    };
  };
  visibility: {
    'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC';
  };
}

const MAX_COMMENTARY = 3000;
const MAX_HASHTAGS = 5;

export class LinkedInPublishingAgent extends BasePublishingAgent {
  readonly platform = 'linkedin' as const;
  private readonly baseUrl = 'https://api.linkedin.com/v2';

  formatContent(share: SocialShare): FormattedContent {
    const hashtags = share.tags.map(tag => this.toHashtag(tag)).filter(Boolean).slice(0, MAX_HASHTAGS);
    let body = `${share.title}\n\n${this.sanitizeContent(share.excerpt)}`;
    if (hashtags.length > 0) {
      body += `\n\n${hashtags.join(' ')}`;
    }

    return {
      title: share.title.substring(0, 200),
      body: body.substring(0, MAX_COMMENTARY),
      link: share.url,
      tags: hashtags,
      imageUrl: share.imageUrl,
    };
  }

  /** Organization and person URNs are passed through; bare ids are treated as organizations. */
  authorUrn(account: SocialAccount): string {
    return account.accountId.startsWith('urn:li:') ? account.accountId : `urn:li:organization:${account.accountId}`;
  }

  async publish(content: FormattedContent, account: SocialAccount): Promise<PublishResult> {
    try {
      this.validateRequiredCredentials(account, ['accessToken', 'accountId']);

      const postData: LinkedInPost = {
        author: this.authorUrn(account),
        lifecycleState: 'PUBLISHED',
        specificContent: {
          'com.linkedin.ugc.ShareContent': {
            shareCommentary: { text: content.body },
            shareMediaCategory: 'ARTICLE',
            media: [{
              status: 'READY',
              originalUrl: content.link,
              title: { text: content.title },
              description: { text: content.title },
            }],
          },
        },
        visibility: {
          'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC',
        },
      };

      const response = await fetch(`${this.baseUrl}/ugcPosts`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${account.accessToken}`,
          'Content-Type': 'application/json',
          'X-Restli-Protocol-Version': '2.0.0',
        },
        body: JSON.stringify(postData),
      });

      if (!response.ok) {
        throw new Error(await this.readError(response));
      }

      const result: unknown = await response.json();
      const id = (isRecord(result) ? readString(result, 'id') : '') || (response.headers.get('x-restli-id') ?? '');

      return {
        success: true,
        platformId: id,
        platformUrl: id ? `https://www.linkedin.com/feed/update/${id}` : undefined,
      };
    } catch (error) {
      console.error(`LinkedIn publishing failed for account ${account.name}:`, error instanceof Error ? error.message : error);
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
      };
    }
  }
}
