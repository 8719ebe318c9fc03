import { v4 as uuidv4 } from 'uuid';
import { TopicStore } from '../repositories/automation-repository';
import { errorMessage, failed, StepOutcome, succeeded } from './result';
import { AutomationRule, Blog, Topic } from './types';

export const MIN_AVAILABLE_TOPICS = 5;
export const TOPICS_PER_CATEGORY = 10;
export const GENERATED_TOPIC_PRIORITY = 5;
export const NO_TOPICS_AVAILABLE = 'No approved topics available';

/** Produces candidate topic titles for a category. */
export interface TopicSource {
  generateTopics(category: string, count: number, blog: Blog): Promise<string[]>;
}

export interface TopicPoolReport {
  available: number;
  created: number;
  skippedCategories: string[];
}

/** Highest priority first; ties go to the oldest topic. */
export function orderTopics(topics: readonly Topic[]): Topic[] {
  return [...topics].sort((a, b) => {
    if (a.priority !== b.priority) {
      return b.priority - a.priority;
    }
    return a.createdAt.localeCompare(b.createdAt);
  });
}

export class TopicSelector {
  constructor(
    private readonly store: TopicStore,
    private readonly source: TopicSource,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Tops up the topic pool when fewer than MIN_AVAILABLE_TOPICS are usable.
   * A category whose generation fails is skipped; storage errors fail the step.
   */
  async ensureTopicPool(rule: AutomationRule, blog: Blog): Promise<StepOutcome<TopicPoolReport>> {
    let available: number;
    try {
      available = (await this.store.listAvailableTopics({ blogId: rule.blogId, categories: rule.categories })).length;
    } catch (error) {
      return failed(`Failed to count available topics: ${errorMessage(error)}`);
    }

    const report: TopicPoolReport = { available, created: 0, skippedCategories: [] };
    if (available >= MIN_AVAILABLE_TOPICS) {
      return succeeded(report);
    }

    console.log(`Only ${available} topic(s) available for rule ${rule.id}, generating more`);

    for (const category of rule.categories) {
      let titles: string[];
      try {
        titles = await this.source.generateTopics(category, TOPICS_PER_CATEGORY, blog);
      } catch (error) {
        console.warn(`Topic generation failed for category ${category}:`, errorMessage(error));
        report.skippedCategories.push(category);
        continue;
      }

      try {
        for (const title of titles) {
          const trimmed = title.trim();
          if (trimmed === '' || await this.store.findTopicByTitle(rule.blogId, trimmed)) {
            continue;
          }
          await this.store.saveTopic({
            id: uuidv4(),
            blogId: rule.blogId,
            title: trimmed,
            category,
            priority: GENERATED_TOPIC_PRIORITY,
            status: rule.autoApproveTopics ? 'approved' : 'pending',
            createdAt: this.now().toISOString(),
            used: false,
          });
          report.created++;
        }
      } catch (error) {
        return failed(`Failed to store generated topics: ${errorMessage(error)}`);
      }
    }

    if (rule.autoApproveTopics) {
      report.available += report.created;
    }
    console.log(`Created ${report.created} topic(s) for rule ${rule.id}`);
    return succeeded(report);
  }

  /**
   * Reserves the best eligible topic. A lost claim means another run took the
   * topic, so the next candidate is tried.
   */
  async selectAndReserve(rule: AutomationRule): Promise<StepOutcome<Topic>> {
    let candidates: Topic[];
    try {
      candidates = orderTopics(await this.store.listAvailableTopics({ blogId: rule.blogId, categories: rule.categories }));
    } catch (error) {
      return failed(`Failed to list topics: ${errorMessage(error)}`);
    }

    for (const topic of candidates) {
      const usedAt = this.now().toISOString();
      let claimed: boolean;
      try {
        claimed = await this.store.claimTopic(topic.id, usedAt);
      } catch (error) {
        return failed(`Failed to reserve topic ${topic.id}: ${errorMessage(error)}`);
      }

      if (claimed) {
        console.log(`Reserved topic ${topic.id}: ${topic.title}`);
        return succeeded({ ...topic, status: 'used', used: true, usedAt });
      }
      console.log(`Topic ${topic.id} was claimed by another run, trying the next one`);
    }

    return failed(NO_TOPICS_AVAILABLE);
  }
}
