import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { mockClient } from 'aws-sdk-client-mock';
import {
  DynamoAutomationRepository,
  toBlog,
  toTopic,
} from '../lambda/repositories/dynamo-automation-repository';
import { TableNames } from '../lambda/utils/config';
import { serializeWorkflowResult } from '../lambda/workflow/workflow-result-codec';
import { makeTopic } from './helpers/fixtures';

const docClientMock = mockClient(DynamoDBDocumentClient);

const tables: TableNames = {
  blogs: 'test-blogs',
  rules: 'test-rules',
  topics: 'test-topics',
  articles: 'test-articles',
  metrics: 'test-metrics',
  workflowRuns: 'test-workflow-runs',
  notifications: 'test-notifications',
};

const ruleItem = {
  id: 'rule-1',
  name: 'Daily skincare',
  blogId: 'blog-1',
  categories: ['Kosmetyki'],
  autoPublish: true,
  autoSocialPost: false,
  autoApproveTopics: true,
  dailyQuota: 2,
  articleLength: 1200,
  active: true,
};

describe('DynamoAutomationRepository', () => {
  let repository: DynamoAutomationRepository;

  beforeEach(() => {
    docClientMock.reset();
    jest.spyOn(console, 'log').mockImplementation();
    repository = new DynamoAutomationRepository(tables, DynamoDBDocumentClient.from(new DynamoDBClient({})));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads an automation rule by id', async () => {
    docClientMock.on(GetCommand).resolves({ Item: ruleItem });

    expect(await repository.getAutomationRule('rule-1')).toEqual({
      id: 'rule-1',
      name: 'Daily skincare',
      blogId: 'blog-1',
      categories: ['Kosmetyki'],
      autoPublish: true,
      autoSocialPost: false,
      autoApproveTopics: true,
      dailyQuota: 2,
      articleLength: 1200,
      active: true,
    });
    expect(docClientMock.commandCalls(GetCommand)[0].args[0].input).toEqual({ TableName: 'test-rules', Key: { id: 'rule-1' } });
  });

  it('returns null for a missing item', async () => {
    docClientMock.on(GetCommand).resolves({});

    expect(await repository.getBlog('blog-404')).toBeNull();
  });

  it('pages through active rules', async () => {
    docClientMock
      .on(ScanCommand)
      .resolvesOnce({ Items: [ruleItem], LastEvaluatedKey: { id: 'rule-1' } })
      .resolvesOnce({ Items: [{ ...ruleItem, id: 'rule-2' }] });

    const rules = await repository.listActiveAutomationRules();

    expect(rules.map(rule => rule.id)).toEqual(['rule-1', 'rule-2']);
    const scans = docClientMock.commandCalls(ScanCommand);
    expect(scans[0].args[0].input).toMatchObject({ TableName: 'test-rules', FilterExpression: 'active = :active' });
    expect(scans[1].args[0].input.ExclusiveStartKey).toEqual({ id: 'rule-1' });
  });

  it('queries available topics by blog and keeps the requested categories', async () => {
    docClientMock.on(QueryCommand).resolves({
      Items: [
        { ...makeTopic({ id: 'topic-1' }) },
        { ...makeTopic({ id: 'topic-2', category: 'Lifestyle' }) },
      ],
    });

    const topics = await repository.listAvailableTopics({ blogId: 'blog-1', categories: ['Kosmetyki'] });

    expect(topics.map(topic => topic.id)).toEqual(['topic-1']);
    expect(docClientMock.commandCalls(QueryCommand)[0].args[0].input).toMatchObject({
      TableName: 'test-topics',
      IndexName: 'BlogIdIndex',
      KeyConditionExpression: 'blogId = :blogId',
      ExpressionAttributeValues: { ':blogId': 'blog-1', ':approved': 'approved', ':used': false },
    });
  });

  it('finds a topic by title', async () => {
    docClientMock
      .on(QueryCommand)
      .resolvesOnce({ Items: [{ ...makeTopic({ id: 'topic-7', title: 'Serum z witaminą C' }) }] })
      .resolvesOnce({ Items: [] });

    expect((await repository.findTopicByTitle('blog-1', 'Serum z witaminą C'))?.id).toBe('topic-7');
    expect(await repository.findTopicByTitle('blog-1', 'Nieznany')).toBeNull();
  });

  describe('claimTopic', () => {
    it('marks the topic used under a condition', async () => {
      docClientMock.on(UpdateCommand).resolves({});

      expect(await repository.claimTopic('topic-1', '2024-05-10T10:00:00.000Z')).toBe(true);
      expect(docClientMock.commandCalls(UpdateCommand)[0].args[0].input).toMatchObject({
        TableName: 'test-topics',
        Key: { id: 'topic-1' },
        ConditionExpression: '#status = :approved AND used = :false',
        ExpressionAttributeValues: {
          ':used': 'used',
          ':approved': 'approved',
          ':true': true,
          ':false': false,
          ':usedAt': '2024-05-10T10:00:00.000Z',
        },
      });
    });

    it('reports a lost race as false', async () => {
      docClientMock.on(UpdateCommand).rejects(new ConditionalCheckFailedException({
        message: 'The conditional request failed',
        $metadata: {},
      }));

      expect(await repository.claimTopic('topic-1', '2024-05-10T10:00:00.000Z')).toBe(false);
    });

    it('rethrows other failures', async () => {
      docClientMock.on(UpdateCommand).rejects(new Error('ProvisionedThroughputExceededException'));

      await expect(repository.claimTopic('topic-1', '2024-05-10T10:00:00.000Z'))
        .rejects.toThrow('ProvisionedThroughputExceededException');
    });
  });

  it('reads published articles from the publication index', async () => {
    docClientMock.on(QueryCommand).resolves({
      Items: [{ id: 'article-1', blogId: 'blog-1', status: 'published', authorId: 2, publishedAt: '2024-05-10T07:00:00.000Z' }],
    });

    const articles = await repository.listPublishedArticles('blog-1', new Date('2024-05-10T00:00:00.000Z'));

    expect(articles[0]).toMatchObject({ id: 'article-1', status: 'published', authorId: 2, wordpressPostId: null, images: [] });
    expect(docClientMock.commandCalls(QueryCommand)[0].args[0].input).toMatchObject({
      TableName: 'test-articles',
      IndexName: 'BlogIdPublishedAtIndex',
      KeyConditionExpression: 'blogId = :blogId AND publishedAt >= :since',
      ExpressionAttributeValues: { ':blogId': 'blog-1', ':since': '2024-05-10T00:00:00.000Z', ':published': 'published' },
    });
  });

  it('stamps articles with an update time', async () => {
    docClientMock.on(PutCommand).resolves({});

    await repository.saveArticle({
      id: 'article-1',
      blogId: 'blog-1',
      topicId: 'topic-1',
      title: 'Tytuł',
      body: '<p>Treść</p>',
      excerpt: 'Zajawka',
      tags: [],
      category: 'Kosmetyki',
      status: 'draft',
      wordpressPostId: null,
      images: [],
      validationWarnings: 0,
      createdAt: '2024-05-10T10:00:00.000Z',
    });

    const input = docClientMock.commandCalls(PutCommand)[0].args[0].input;
    expect(input.TableName).toBe('test-articles');
    expect(input.Item).toMatchObject({ id: 'article-1', updatedAt: expect.any(String) });
  });

  it('keys workflow runs by workflow id and reads them back', async () => {
    const record = serializeWorkflowResult({
      workflowId: 'wf-1',
      ruleId: 'rule-1',
      status: 'failed',
      stepsCompleted: ['topic_management', 'metrics_update'],
      stepsFailed: ['topic_selection'],
      errors: ['No approved topics available'],
      articleId: null,
      wordpressPostId: null,
      socialMediaPosts: [],
      startedAt: new Date('2024-05-10T10:00:00.000Z'),
      failedAt: new Date('2024-05-10T10:00:05.000Z'),
      metrics: {
        executionTimeSeconds: 5,
        stepsCompleted: 2,
        stepsFailed: 1,
        successRate: (2 / 7) * 100,
        articleGenerated: false,
        wordpressPublished: false,
        socialPostsCreated: 0,
        generationAttempts: 0,
        validationWarnings: 0,
      },
    });
    docClientMock.on(PutCommand).resolves({});
    docClientMock.on(GetCommand).resolves({ Item: { id: 'wf-1', ...record } });

    await repository.saveWorkflowResult(record);
    const restored = await repository.getWorkflowResult('wf-1');

    expect(docClientMock.commandCalls(PutCommand)[0].args[0].input).toEqual({
      TableName: 'test-workflow-runs',
      Item: { id: 'wf-1', ...record },
    });
    expect(restored?.status).toBe('failed');
    expect(restored?.failedAt).toEqual(new Date('2024-05-10T10:00:05.000Z'));
    expect(restored?.stepsFailed).toEqual(['topic_selection']);
  });

  describe('item decoding', () => {
    it('keeps only social accounts on known platforms', () => {
      const blog = toBlog({
        id: 'blog-1',
        name: 'pielegnacja-codzienna.pl',
        socialAccounts: [
          { id: 'a', platform: 'linkedin', accountId: '1', accessToken: 'test-token' },
          { id: 'b', platform: 'tiktok', accountId: '2' },
        ],
      });

      expect(blog.socialAccounts).toEqual([
        { id: 'a', platform: 'linkedin', name: '', accessToken: 'test-token', accountId: '1', active: true },
      ]);
      expect(blog.language).toBe('pl');
      expect(blog.active).toBe(true);
    });

    it('falls back to pending for an unknown topic status', () => {
      expect(toTopic({ id: 'topic-1', status: 'archived' }).status).toBe('pending');
    });
  });
});
