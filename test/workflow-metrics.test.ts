import { CloudWatchClient, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { mockClient } from 'aws-sdk-client-mock';
import { WorkflowResult } from '../lambda/workflow/types';
import { CloudWatchMetricsSink, computeWorkflowMetrics } from '../lambda/workflow/workflow-metrics';

const cloudWatchMock = mockClient(CloudWatchClient);

describe('computeWorkflowMetrics', () => {
  it('counts a full run as complete', () => {
    const metrics = computeWorkflowMetrics({
      startedAt: new Date('2024-05-10T10:00:00.000Z'),
      finishedAt: new Date('2024-05-10T10:01:30.500Z'),
      stepsCompleted: [
        'topic_management',
        'topic_selection',
        'content_generation',
        'image_acquisition',
        'publishing',
        'social_posting',
        'metrics_update',
      ],
      stepsFailed: [],
      articleId: 'article-1',
      wordpressPostId: 501,
      socialPostsCreated: 2,
      generationAttempts: 1,
      validationWarnings: 0,
    });

    expect(metrics).toEqual({
      executionTimeSeconds: 90.5,
      stepsCompleted: 7,
      stepsFailed: 0,
      successRate: 100,
      articleGenerated: true,
      wordpressPublished: true,
      socialPostsCreated: 2,
      generationAttempts: 1,
      validationWarnings: 0,
    });
  });

  it('never reports a negative duration', () => {
    const metrics = computeWorkflowMetrics({
      startedAt: new Date('2024-05-10T10:00:01.000Z'),
      finishedAt: new Date('2024-05-10T10:00:00.000Z'),
      stepsCompleted: ['metrics_update'],
      stepsFailed: ['topic_selection'],
      articleId: null,
      wordpressPostId: null,
      socialPostsCreated: 0,
      generationAttempts: 0,
      validationWarnings: 0,
    });

    expect(metrics.executionTimeSeconds).toBe(0);
    expect(metrics.articleGenerated).toBe(false);
    expect(metrics.successRate).toBeCloseTo(14.2857, 3);
  });
});

describe('CloudWatchMetricsSink', () => {
  beforeEach(() => {
    cloudWatchMock.reset();
    cloudWatchMock.on(PutMetricDataCommand).resolves({});
  });

  it('publishes one datum per workflow metric', async () => {
    const completedAt = new Date('2024-05-10T10:01:00.000Z');
    const result: WorkflowResult = {
      workflowId: 'wf-1',
      ruleId: 'rule-1',
      status: 'completed',
      stepsCompleted: ['topic_management', 'metrics_update'],
      stepsFailed: [],
      errors: [],
      articleId: 'article-1',
      wordpressPostId: 501,
      socialMediaPosts: [],
      startedAt: new Date('2024-05-10T10:00:00.000Z'),
      completedAt,
      metrics: {
        executionTimeSeconds: 60,
        stepsCompleted: 2,
        stepsFailed: 0,
        successRate: (2 / 7) * 100,
        articleGenerated: true,
        wordpressPublished: true,
        socialPostsCreated: 0,
        generationAttempts: 3,
        validationWarnings: 4,
      },
    };

    await new CloudWatchMetricsSink(new CloudWatchClient({})).publish(result);

    const input = cloudWatchMock.commandCalls(PutMetricDataCommand)[0].args[0].input;
    expect(input.Namespace).toBe('BlogAutomation/Workflow');
    expect(input.MetricData?.map(datum => [datum.MetricName, datum.Value])).toEqual([
      ['WorkflowExecutionTime', 60],
      ['WorkflowSuccess', 1],
      ['StepsCompleted', 2],
      ['StepsFailed', 0],
      ['SuccessRate', (2 / 7) * 100],
      ['ArticlesPublished', 1],
      ['SocialPostsCreated', 0],
      ['GenerationAttempts', 3],
      ['ValidationWarnings', 4],
    ]);
    expect(input.MetricData?.[0]).toMatchObject({
      Unit: 'Seconds',
      Dimensions: [{ Name: 'RuleId', Value: 'rule-1' }],
      Timestamp: completedAt,
    });
  });
});
