import { PublicationLog } from '../authors/author-rotation-manager';
import {
  Article,
  AutomationRule,
  Blog,
  ContentMetrics,
  Notification,
  Topic,
  WorkflowResult,
} from '../workflow/types';
import { WorkflowResultRecord } from '../workflow/workflow-result-codec';

export interface TopicQuery {
  blogId: string;
  categories: readonly string[];
}

/** Approved, unused topics for a blog, restricted to the given categories. */
export interface TopicStore {
  listAvailableTopics(query: TopicQuery): Promise<Topic[]>;
  findTopicByTitle(blogId: string, title: string): Promise<Topic | null>;
  saveTopic(topic: Topic): Promise<void>;
  /**
   * Atomically moves an approved, unused topic to used. Resolves false when
   * another run got there first.
   */
  claimTopic(topicId: string, usedAt: string): Promise<boolean>;
}

export interface AutomationRepository extends TopicStore, PublicationLog {
  getAutomationRule(ruleId: string): Promise<AutomationRule | null>;
  listActiveAutomationRules(): Promise<AutomationRule[]>;
  getBlog(blogId: string): Promise<Blog | null>;
  saveArticle(article: Article): Promise<void>;
  saveContentMetrics(metrics: ContentMetrics): Promise<void>;
  saveWorkflowResult(record: WorkflowResultRecord): Promise<void>;
  getWorkflowResult(workflowId: string): Promise<WorkflowResult | null>;
  saveNotification(notification: Notification): Promise<void>;
}

export function matchesTopicQuery(topic: Topic, query: TopicQuery): boolean {
  return topic.blogId === query.blogId
    && topic.status === 'approved'
    && !topic.used
    && (query.categories.length === 0 || query.categories.includes(topic.category));
}
