import { ValidationError } from '../lambda/utils/error-handler';
import { WorkflowResult } from '../lambda/workflow/types';
import {
  deserializeWorkflowResult,
  isWorkflowStep,
  serializeWorkflowResult,
} from '../lambda/workflow/workflow-result-codec';

const result: WorkflowResult = {
  workflowId: 'wf-1',
  ruleId: 'rule-1',
  status: 'completed',
  stepsCompleted: ['topic_management', 'topic_selection', 'content_generation', 'image_acquisition', 'metrics_update'],
  stepsFailed: ['publishing'],
  errors: ['WordPress API /wp/v2/posts returned 500: boom', 'Image acquisition failed: timeout'],
  articleId: 'article-1',
  wordpressPostId: null,
  socialMediaPosts: [{ platform: 'linkedin', postId: 'urn:li:share:1', url: 'https://www.linkedin.com/feed/update/urn:li:share:1' }],
  startedAt: new Date('2024-05-10T10:00:00.000Z'),
  completedAt: new Date('2024-05-10T10:02:30.000Z'),
  metrics: {
    executionTimeSeconds: 150,
    stepsCompleted: 5,
    stepsFailed: 1,
    successRate: (5 / 7) * 100,
    articleGenerated: true,
    wordpressPublished: false,
    socialPostsCreated: 1,
    generationAttempts: 2,
    validationWarnings: 0,
  },
};

describe('workflow result codec', () => {
  it('writes dates as ISO strings and leaves absent timestamps out', () => {
    const record = serializeWorkflowResult(result);

    expect(record.startedAt).toBe('2024-05-10T10:00:00.000Z');
    expect(record.completedAt).toBe('2024-05-10T10:02:30.000Z');
    expect('failedAt' in record).toBe(false);
    expect(record.wordpressPostId).toBeNull();
  });

  it('reads back step order, errors and metrics', () => {
    const restored = deserializeWorkflowResult(JSON.parse(JSON.stringify(serializeWorkflowResult(result))));

    expect(restored).toEqual(result);
    expect(restored.stepsCompleted).toEqual([
      'topic_management',
      'topic_selection',
      'content_generation',
      'image_acquisition',
      'metrics_update',
    ]);
    expect(restored.errors).toEqual(result.errors);
  });

  it('returns a frozen result', () => {
    const restored = deserializeWorkflowResult(serializeWorkflowResult(result));

    expect(Object.isFrozen(restored)).toBe(true);
    expect(Object.isFrozen(restored.stepsCompleted)).toBe(true);
    expect(Object.isFrozen(restored.metrics)).toBe(true);
  });

  it('drops social posts for platforms it does not know', () => {
    const record = {
      ...serializeWorkflowResult(result),
      socialMediaPosts: [{ platform: 'myspace', postId: '1' }, { platform: 'facebook', postId: '2' }],
    };

    expect(deserializeWorkflowResult(record).socialMediaPosts).toEqual([{ platform: 'facebook', postId: '2' }]);
  });

  it('rejects malformed records', () => {
    const record = serializeWorkflowResult(result);

    expect(() => deserializeWorkflowResult('wf-1')).toThrow(ValidationError);
    expect(() => deserializeWorkflowResult({ ...record, status: 'done' })).toThrow('Unknown workflow status "done"');
    expect(() => deserializeWorkflowResult({ ...record, stepsFailed: ['publish'] }))
      .toThrow('Unknown workflow step "publish" in stepsFailed');
    expect(() => deserializeWorkflowResult({ ...record, startedAt: 'yesterday' }))
      .toThrow('Invalid startedAt timestamp: yesterday');
    expect(() => deserializeWorkflowResult({ ...record, startedAt: undefined }))
      .toThrow('Workflow result record is missing startedAt');
  });

  it('recognises workflow step names', () => {
    expect(isWorkflowStep('social_posting')).toBe(true);
    expect(isWorkflowStep('cleanup')).toBe(false);
  });
});
