import { CloudWatchClient, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { DynamoDBDocumentClient, GetCommand, PutCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { SendMessageCommand, SQSClient } from '@aws-sdk/client-sqs';
import { SQSEvent } from 'aws-lambda';
import { mockClient } from 'aws-sdk-client-mock';
import {
  AutomationRuntime,
  createAutomationRuntime,
  handler,
  isQueueEvent,
  isRunRuleEvent,
  processQueueEvent,
  runAutomationRule,
  runQueuedRun,
  runScheduledSweep,
  WorkflowRunner,
} from '../lambda/automation-handler';
import { loadConfig } from '../lambda/utils/config';
import { ValidationError } from '../lambda/utils/error-handler';
import { QueuedRun, RunQueue } from '../lambda/workflow/run-queue';
import { AutomationRule, WorkflowResult, WorkflowStatus } from '../lambda/workflow/types';
import { makeRule } from './helpers/fixtures';

const docClientMock = mockClient(DynamoDBDocumentClient);
const cloudWatchMock = mockClient(CloudWatchClient);
const snsMock = mockClient(SNSClient);
const sqsMock = mockClient(SQSClient);

const QUEUE_URL = 'https://sqs.us-east-1.amazonaws.com/123456789012/test-runs';

const TEST_ENV = {
  AWS_REGION: 'us-east-1',
  BLOGS_TABLE_NAME: 'test-blogs',
  RULES_TABLE_NAME: 'test-rules',
  TOPICS_TABLE_NAME: 'test-topics',
  ARTICLES_TABLE_NAME: 'test-articles',
  METRICS_TABLE_NAME: 'test-metrics',
  WORKFLOW_RUNS_TABLE_NAME: 'test-workflow-runs',
  NOTIFICATIONS_TABLE_NAME: 'test-notifications',
  IMAGE_BUCKET_NAME: 'test-images',
  RUN_QUEUE_URL: QUEUE_URL,
};

function resultFor(ruleId: string, status: WorkflowStatus, errors: string[] = []): WorkflowResult {
  return {
    workflowId: `wf-${ruleId}`,
    ruleId,
    status,
    stepsCompleted: status === 'completed' ? ['topic_management', 'metrics_update'] : ['metrics_update'],
    stepsFailed: status === 'completed' ? [] : ['topic_selection'],
    errors,
    articleId: null,
    wordpressPostId: null,
    socialMediaPosts: [],
    startedAt: new Date('2024-05-10T06:00:00.000Z'),
    completedAt: status === 'completed' ? new Date('2024-05-10T06:01:00.000Z') : undefined,
    failedAt: status === 'completed' ? undefined : new Date('2024-05-10T06:00:10.000Z'),
    metrics: {
      executionTimeSeconds: 60,
      stepsCompleted: 2,
      stepsFailed: 0,
      successRate: (2 / 7) * 100,
      articleGenerated: false,
      wordpressPublished: false,
      socialPostsCreated: 0,
      generationAttempts: 0,
      validationWarnings: 0,
    },
  };
}

function queueEvent(...bodies: string[]): SQSEvent {
  return {
    Records: bodies.map((body, index) => ({
      messageId: `message-${index + 1}`,
      receiptHandle: `receipt-${index + 1}`,
      body,
      attributes: {
        ApproximateReceiveCount: '1',
        SentTimestamp: '1715320800000',
        SenderId: 'test-sender',
        ApproximateFirstReceiveTimestamp: '1715320800000',
      },
      messageAttributes: {},
      md5OfBody: 'test-md5',
      eventSource: 'aws:sqs',
      eventSourceARN: 'arn:aws:sqs:us-east-1:123456789012:test-runs',
      awsRegion: 'us-east-1',
    })),
  };
}

function recordingQueue(): RunQueue & { queued: QueuedRun[] } {
  const queued: QueuedRun[] = [];
  return {
    queued,
    enqueue: jest.fn(async (run: QueuedRun) => {
      queued.push(run);
    }),
  };
}

function runtimeWith(engine: WorkflowRunner, queue: RunQueue, rules: AutomationRule[] = []): AutomationRuntime {
  return {
    engine,
    queue,
    rules: { listActiveAutomationRules: jest.fn().mockResolvedValue(rules) },
  };
}

describe('automation handler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('recognises single-rule events', () => {
    expect(isRunRuleEvent({ ruleId: 'rule-1' })).toBe(true);
    expect(isRunRuleEvent({ ruleId: '   ' })).toBe(false);
    expect(isRunRuleEvent({ 'source': 'aws.events', 'detail-type': 'Scheduled Event', 'detail': {} })).toBe(false);
    expect(isRunRuleEvent(null)).toBe(false);
  });

  it('recognises queue events', () => {
    expect(isQueueEvent(queueEvent('{}'))).toBe(true);
    expect(isQueueEvent({ ruleId: 'rule-1' })).toBe(false);
  });

  it('serialises the result of a single rule run', async () => {
    const engine: jest.Mocked<WorkflowRunner> = {
      runById: jest.fn().mockResolvedValue(resultFor('rule-1', 'completed')),
    };

    const record = await runAutomationRule('rule-1', engine);

    expect(engine.runById).toHaveBeenCalledWith('rule-1');
    expect(record).toMatchObject({
      workflowId: 'wf-rule-1',
      status: 'completed',
      startedAt: '2024-05-10T06:00:00.000Z',
      completedAt: '2024-05-10T06:01:00.000Z',
    });
  });

  describe('runScheduledSweep', () => {
    it('queues the first run of every active rule without running anything', async () => {
      const engine: jest.Mocked<WorkflowRunner> = { runById: jest.fn() };
      const queue = recordingQueue();
      const rules = [
        makeRule({ id: 'rule-1', dailyQuota: 2 }),
        makeRule({ id: 'rule-2', dailyQuota: 0 }),
        makeRule({ id: 'rule-3', dailyQuota: 3 }),
      ];

      const summary = await runScheduledSweep(runtimeWith(engine, queue, rules));

      expect(summary).toEqual({ rulesQueued: 3, runsPlanned: 6 });
      expect(queue.queued).toEqual([
        { ruleId: 'rule-1', run: 1, quota: 2 },
        { ruleId: 'rule-2', run: 1, quota: 1 },
        { ruleId: 'rule-3', run: 1, quota: 3 },
      ]);
      expect(engine.runById).not.toHaveBeenCalled();
    });

    it('does nothing without active rules', async () => {
      const queue = recordingQueue();

      expect(await runScheduledSweep(runtimeWith({ runById: jest.fn() }, queue))).toEqual({ rulesQueued: 0, runsPlanned: 0 });
      expect(queue.queued).toEqual([]);
    });
  });

  describe('runQueuedRun', () => {
    it('queues the next run after a completed one', async () => {
      const queue = recordingQueue();
      const engine: jest.Mocked<WorkflowRunner> = { runById: jest.fn().mockResolvedValue(resultFor('rule-1', 'completed')) };

      const record = await runQueuedRun({ ruleId: 'rule-1', run: 1, quota: 3 }, runtimeWith(engine, queue));

      expect(record.status).toBe('completed');
      expect(queue.queued).toEqual([{ ruleId: 'rule-1', run: 2, quota: 3 }]);
    });

    it('stops after the last run of the quota', async () => {
      const queue = recordingQueue();
      const engine: jest.Mocked<WorkflowRunner> = { runById: jest.fn().mockResolvedValue(resultFor('rule-1', 'completed')) };

      await runQueuedRun({ ruleId: 'rule-1', run: 3, quota: 3 }, runtimeWith(engine, queue));

      expect(queue.queued).toEqual([]);
    });

    it('stops a rule at its first run that does not complete', async () => {
      const queue = recordingQueue();
      const engine: jest.Mocked<WorkflowRunner> = {
        runById: jest.fn().mockResolvedValue(
          resultFor('rule-3', 'failed', ['Topic selection failed: No approved topics available'])
        ),
      };

      const record = await runQueuedRun({ ruleId: 'rule-3', run: 1, quota: 3 }, runtimeWith(engine, queue));

      expect(record.status).toBe('failed');
      expect(queue.queued).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith(
        'Rule rule-3 stopped after run 1/3: Topic selection failed: No approved topics available'
      );
    });
  });

  describe('processQueueEvent', () => {
    it('runs each queued message', async () => {
      const queue = recordingQueue();
      const engine: jest.Mocked<WorkflowRunner> = { runById: jest.fn().mockResolvedValue(resultFor('rule-1', 'completed')) };

      const records = await processQueueEvent(
        queueEvent(JSON.stringify({ ruleId: 'rule-1', run: 1, quota: 2 })),
        runtimeWith(engine, queue)
      );

      expect(records).toHaveLength(1);
      expect(engine.runById).toHaveBeenCalledWith('rule-1');
      expect(queue.queued).toEqual([{ ruleId: 'rule-1', run: 2, quota: 2 }]);
    });

    it('rejects a malformed message before running anything', async () => {
      const engine: jest.Mocked<WorkflowRunner> = { runById: jest.fn() };

      await expect(processQueueEvent(queueEvent('{"ruleId":"rule-1","run":4,"quota":3}'), runtimeWith(engine, recordingQueue())))
        .rejects.toThrow(ValidationError);
      expect(engine.runById).not.toHaveBeenCalled();
    });
  });

  it('warns when no image provider is configured', async () => {
    await createAutomationRuntime(loadConfig(TEST_ENV), { rosterLoader: async () => ({ rosters: {} }) });

    expect(console.warn).toHaveBeenCalledWith('No image provider keys configured, articles will be published without images');
  });

  it('loads author rosters while building the runtime', async () => {
    const rosterLoader = jest.fn().mockResolvedValue({ rosters: {} });

    await createAutomationRuntime(loadConfig(TEST_ENV), { rosterLoader });

    expect(rosterLoader).toHaveBeenCalledTimes(1);
  });

  describe('handler', () => {
    const previousEnv = { ...process.env };

    beforeAll(() => {
      Object.assign(process.env, TEST_ENV);
    });

    afterAll(() => {
      process.env = previousEnv;
    });

    beforeEach(() => {
      docClientMock.reset();
      cloudWatchMock.reset();
      snsMock.reset();
      sqsMock.reset();
      docClientMock.on(PutCommand).resolves({});
      cloudWatchMock.on(PutMetricDataCommand).resolves({});
      snsMock.on(PublishCommand).resolves({});
      sqsMock.on(SendMessageCommand).resolves({});
    });

    it('reports a missing rule as a failed run', async () => {
      docClientMock.on(GetCommand).resolves({});

      const record = await handler({ ruleId: 'rule-404' });

      expect(record).toMatchObject({
        ruleId: 'rule-404',
        status: 'failed',
        errors: ['Automation rule rule-404 not found'],
      });
    });

    it('sends the first run of each active rule to the run queue', async () => {
      docClientMock.on(ScanCommand).resolves({
        Items: [{ id: 'rule-1', name: 'Daily skincare', blogId: 'blog-1', categories: ['Kosmetyki'], dailyQuota: 2, active: true }],
      });

      const summary = await handler({
        'id': 'event-1',
        'version': '0',
        'account': '123456789012',
        'time': '2024-05-10T06:00:00Z',
        'region': 'us-east-1',
        'resources': [],
        'source': 'aws.events',
        'detail-type': 'Scheduled Event',
        'detail': {},
      });

      expect(summary).toEqual({ rulesQueued: 1, runsPlanned: 2 });
      const sends = sqsMock.commandCalls(SendMessageCommand);
      expect(sends).toHaveLength(1);
      expect(sends[0].args[0].input).toMatchObject({
        QueueUrl: QUEUE_URL,
        MessageBody: '{"ruleId":"rule-1","run":1,"quota":2}',
        MessageAttributes: { ruleId: { StringValue: 'rule-1', DataType: 'String' } },
      });
    });

    it('does not queue a follow-up after a failed queued run', async () => {
      docClientMock.on(GetCommand).resolves({});

      await handler(queueEvent('{"ruleId":"rule-404","run":1,"quota":2}'));

      expect(sqsMock.commandCalls(SendMessageCommand)).toHaveLength(0);
      expect(console.warn).toHaveBeenCalledWith('Rule rule-404 stopped after run 1/2: Automation rule rule-404 not found');
    });

    it('rethrows when the rules cannot be listed', async () => {
      docClientMock.rejects(new Error('AccessDeniedException'));

      await expect(handler({
        'id': 'event-1',
        'version': '0',
        'account': '123456789012',
        'time': '2024-05-10T06:00:00Z',
        'region': 'us-east-1',
        'resources': [],
        'source': 'aws.events',
        'detail-type': 'Scheduled Event',
        'detail': {},
      })).rejects.toThrow('AccessDeniedException');
      expect(console.error).toHaveBeenCalledWith('Automation handler failed:', 'AccessDeniedException');
    });
  });
});
