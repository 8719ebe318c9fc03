import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  QueryCommandOutput,
  ScanCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { TableNames } from '../utils/config';
import {
  isRecord,
  JsonRecord,
  readBoolean,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readRecordArray,
  readString,
  readStringArray,
} from '../utils/json';
import {
  Article,
  ArticleStatus,
  AutomationRule,
  Blog,
  ContentMetrics,
  Notification,
  SocialAccount,
  SocialPlatform,
  StoredImage,
  Topic,
  TopicStatus,
  WorkflowResult,
} from '../workflow/types';
import { deserializeWorkflowResult, WorkflowResultRecord } from '../workflow/workflow-result-codec';
import { AutomationRepository, matchesTopicQuery, TopicQuery } from './automation-repository';

export const TOPICS_BY_BLOG_INDEX = 'BlogIdIndex';
export const ARTICLES_BY_PUBLICATION_INDEX = 'BlogIdPublishedAtIndex';

const TOPIC_STATUSES: readonly TopicStatus[] = ['pending', 'approved', 'in_progress', 'used', 'rejected', 'error'];
const ARTICLE_STATUSES: readonly ArticleStatus[] = ['draft', 'ready', 'published', 'failed'];
const PLATFORMS: readonly SocialPlatform[] = ['linkedin', 'facebook'];

function oneOf<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

export function toAutomationRule(item: JsonRecord): AutomationRule {
  const rule: AutomationRule = {
    id: readString(item, 'id'),
    name: readString(item, 'name'),
    blogId: readString(item, 'blogId'),
    categories: readStringArray(item, 'categories'),
    autoPublish: readBoolean(item, 'autoPublish'),
    autoSocialPost: readBoolean(item, 'autoSocialPost'),
    autoApproveTopics: readBoolean(item, 'autoApproveTopics'),
    dailyQuota: readNumber(item, 'dailyQuota', 1),
    active: readBoolean(item, 'active'),
  };
  const articleLength = readOptionalNumber(item, 'articleLength');
  if (articleLength !== undefined) {
    rule.articleLength = articleLength;
  }
  return rule;
}

function toSocialAccount(item: JsonRecord): SocialAccount | null {
  const platform = PLATFORMS.find(candidate => candidate === readString(item, 'platform'));
  if (!platform) {
    return null;
  }
  return {
    id: readString(item, 'id'),
    platform,
    name: readString(item, 'name'),
    accessToken: readString(item, 'accessToken'),
    accountId: readString(item, 'accountId'),
    active: readBoolean(item, 'active', true),
  };
}

export function toBlog(item: JsonRecord): Blog {
  const blog: Blog = {
    id: readString(item, 'id'),
    name: readString(item, 'name'),
    url: readString(item, 'url'),
    apiUrl: readString(item, 'apiUrl'),
    username: readString(item, 'username'),
    apiToken: readString(item, 'apiToken'),
    language: readString(item, 'language', 'pl'),
    socialAccounts: readRecordArray(item, 'socialAccounts')
      .map(toSocialAccount)
      .filter((account): account is SocialAccount => account !== null),
    active: readBoolean(item, 'active', true),
  };
  const defaultCategoryId = readOptionalNumber(item, 'defaultCategoryId');
  if (defaultCategoryId !== undefined) {
    blog.defaultCategoryId = defaultCategoryId;
  }
  return blog;
}

export function toTopic(item: JsonRecord): Topic {
  const topic: Topic = {
    id: readString(item, 'id'),
    blogId: readString(item, 'blogId'),
    title: readString(item, 'title'),
    category: readString(item, 'category'),
    priority: readNumber(item, 'priority'),
    status: oneOf(TOPIC_STATUSES, readString(item, 'status'), 'pending'),
    createdAt: readString(item, 'createdAt'),
    used: readBoolean(item, 'used'),
  };
  const usedAt = readOptionalString(item, 'usedAt');
  if (usedAt !== undefined) {
    topic.usedAt = usedAt;
  }
  return topic;
}

function toStoredImage(item: JsonRecord): StoredImage {
  return {
    key: readString(item, 'key'),
    url: readString(item, 'url'),
    sourceUrl: readString(item, 'sourceUrl'),
    source: readString(item, 'source'),
    attribution: readString(item, 'attribution'),
    width: readNumber(item, 'width'),
    height: readNumber(item, 'height'),
  };
}

export function toArticle(item: JsonRecord): Article {
  return {
    id: readString(item, 'id'),
    blogId: readString(item, 'blogId'),
    topicId: readString(item, 'topicId'),
    title: readString(item, 'title'),
    body: readString(item, 'body'),
    excerpt: readString(item, 'excerpt'),
    tags: readStringArray(item, 'tags'),
    category: readString(item, 'category'),
    status: oneOf(ARTICLE_STATUSES, readString(item, 'status'), 'draft'),
    wordpressPostId: readOptionalNumber(item, 'wordpressPostId') ?? null,
    postUrl: readOptionalString(item, 'postUrl'),
    authorId: readOptionalNumber(item, 'authorId'),
    featuredImageUrl: readOptionalString(item, 'featuredImageUrl'),
    images: readRecordArray(item, 'images').map(toStoredImage),
    validationWarnings: readNumber(item, 'validationWarnings'),
    createdAt: readString(item, 'createdAt'),
    publishedAt: readOptionalString(item, 'publishedAt'),
  };
}

function items(output: { Items?: Record<string, unknown>[] }): JsonRecord[] {
  return (output.Items ?? []).filter(isRecord);
}

/**
 * DynamoDB-backed store for rules, blogs, topics, articles and run records.
 * Table names come from the stack; topics and published articles are read
 * through the blog-keyed secondary indexes.
 */
export class DynamoAutomationRepository implements AutomationRepository {
  private readonly docClient: DynamoDBDocumentClient;

  constructor(private readonly tables: TableNames, docClient?: DynamoDBDocumentClient) {
    this.docClient = docClient ?? DynamoDBDocumentClient.from(
      new DynamoDBClient({ region: process.env.AWS_REGION }),
      { marshallOptions: { removeUndefinedValues: true } }
    );
  }

  async getAutomationRule(ruleId: string): Promise<AutomationRule | null> {
    const item = await this.getItem(this.tables.rules, ruleId);
    return item ? toAutomationRule(item) : null;
  }

  async listActiveAutomationRules(): Promise<AutomationRule[]> {
    const rules: AutomationRule[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const output = await this.docClient.send(new ScanCommand({
        TableName: this.tables.rules,
        FilterExpression: 'active = :active',
        ExpressionAttributeValues: { ':active': true },
        ExclusiveStartKey: exclusiveStartKey,
      }));
      rules.push(...items(output).map(toAutomationRule));
      exclusiveStartKey = output.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return rules;
  }

  async getBlog(blogId: string): Promise<Blog | null> {
    const item = await this.getItem(this.tables.blogs, blogId);
    return item ? toBlog(item) : null;
  }

  async listAvailableTopics(query: TopicQuery): Promise<Topic[]> {
    const topics = await this.queryAll(query.blogId, exclusiveStartKey => new QueryCommand({
      TableName: this.tables.topics,
      IndexName: TOPICS_BY_BLOG_INDEX,
      KeyConditionExpression: 'blogId = :blogId',
      FilterExpression: '#status = :approved AND used = :used',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':blogId': query.blogId, ':approved': 'approved', ':used': false },
      ExclusiveStartKey: exclusiveStartKey,
    }));
    return topics.map(toTopic).filter(topic => matchesTopicQuery(topic, query));
  }

  async findTopicByTitle(blogId: string, title: string): Promise<Topic | null> {
    const matches = await this.queryAll(blogId, exclusiveStartKey => new QueryCommand({
      TableName: this.tables.topics,
      IndexName: TOPICS_BY_BLOG_INDEX,
      KeyConditionExpression: 'blogId = :blogId',
      FilterExpression: 'title = :title',
      ExpressionAttributeValues: { ':blogId': blogId, ':title': title },
      ExclusiveStartKey: exclusiveStartKey,
    }));
    return matches.length > 0 ? toTopic(matches[0]) : null;
  }

  async saveTopic(topic: Topic): Promise<void> {
    await this.putItem(this.tables.topics, { ...topic });
  }

  async claimTopic(topicId: string, usedAt: string): Promise<boolean> {
    try {
      await this.docClient.send(new UpdateCommand({
        TableName: this.tables.topics,
        Key: { id: topicId },
        UpdateExpression: 'SET #status = :used, used = :true, usedAt = :usedAt',
        ConditionExpression: '#status = :approved AND used = :false',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':used': 'used',
          ':approved': 'approved',
          ':true': true,
          ':false': false,
          ':usedAt': usedAt,
        },
      }));
      return true;
    } catch (error) {
      if (error instanceof Error && error.name === 'ConditionalCheckFailedException') {
        console.log(`Topic ${topicId} was already claimed`);
        return false;
      }
      throw error;
    }
  }

  async listPublishedArticles(blogId: string, since: Date): Promise<Article[]> {
    const articles = await this.queryAll(blogId, exclusiveStartKey => new QueryCommand({
      TableName: this.tables.articles,
      IndexName: ARTICLES_BY_PUBLICATION_INDEX,
      KeyConditionExpression: 'blogId = :blogId AND publishedAt >= :since',
      FilterExpression: '#status = :published',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':blogId': blogId, ':since': since.toISOString(), ':published': 'published' },
      ExclusiveStartKey: exclusiveStartKey,
    }));
    return articles.map(toArticle);
  }

  async saveArticle(article: Article): Promise<void> {
    await this.putItem(this.tables.articles, { ...article, updatedAt: new Date().toISOString() });
  }

  async saveContentMetrics(metrics: ContentMetrics): Promise<void> {
    await this.putItem(this.tables.metrics, { ...metrics });
  }

  async saveWorkflowResult(record: WorkflowResultRecord): Promise<void> {
    await this.putItem(this.tables.workflowRuns, { id: record.workflowId, ...record });
  }

  async getWorkflowResult(workflowId: string): Promise<WorkflowResult | null> {
    const item = await this.getItem(this.tables.workflowRuns, workflowId);
    return item ? deserializeWorkflowResult(item) : null;
  }

  async saveNotification(notification: Notification): Promise<void> {
    await this.putItem(this.tables.notifications, { ...notification });
  }

  private async getItem(tableName: string, id: string): Promise<JsonRecord | null> {
    const output = await this.docClient.send(new GetCommand({
      TableName: tableName,
      Key: { id },
    }));
    return isRecord(output.Item) ? output.Item : null;
  }

  private async putItem(tableName: string, item: JsonRecord): Promise<void> {
    await this.docClient.send(new PutCommand({
      TableName: tableName,
      Item: item,
    }));
  }

  private async queryAll(
    blogId: string,
    buildQuery: (exclusiveStartKey: Record<string, unknown> | undefined) => QueryCommand
  ): Promise<JsonRecord[]> {
    const collected: JsonRecord[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const output: QueryCommandOutput = await this.docClient.send(buildQuery(exclusiveStartKey));
      collected.push(...items(output));
      exclusiveStartKey = output.LastEvaluatedKey;
    } while (exclusiveStartKey);

    console.log(`Read ${collected.length} item(s) for blog ${blogId}`);
    return collected;
  }
}
