import { PublishingAgent, PublishResult, SocialShare } from './base-publishing-agent';
import { FacebookPublishingAgent } from './facebook-agent';
import { LinkedInPublishingAgent } from './linkedin-agent';
import { SocialAccount, SocialPlatform } from '../workflow/types';

export interface AccountPublishResult {
  account: SocialAccount;
  result: PublishResult;
}

export class PublishingAgentRegistry {
  private agents: Map<SocialPlatform, PublishingAgent> = new Map();

  constructor(agents: PublishingAgent[] = [new LinkedInPublishingAgent(), new FacebookPublishingAgent()]) {
    for (const agent of agents) {
      this.registerAgent(agent);
    }
  }

  registerAgent(agent: PublishingAgent): void {
    this.agents.set(agent.platform, agent);
  }

  getAgent(platform: SocialPlatform): PublishingAgent | null {
    return this.agents.get(platform) ?? null;
  }

  async publish(account: SocialAccount, share: SocialShare): Promise<PublishResult> {
    const agent = this.getAgent(account.platform);
    if (!agent) {
      return { success: false, error: `Publishing agent not found for platform: ${account.platform}` };
    }

    try {
      return await agent.publish(agent.formatContent(share), account);
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
      };
    }
  }

  /**
   * Posts to every active account in parallel. One channel failing never
   * affects the others; each outcome is reported in account order.
   */
  async publishToAccounts(accounts: readonly SocialAccount[], share: SocialShare): Promise<AccountPublishResult[]> {
    const active = accounts.filter(account => account.active);
    return Promise.all(active.map(async account => ({ account, result: await this.publish(account, share) })));
  }
}
