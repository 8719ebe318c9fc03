import { ValidationError } from '../utils/error-handler';
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
  SocialPlatform,
  SocialPostReference,
  WorkflowMetrics,
  WorkflowResult,
  WorkflowStatus,
  WorkflowStep,
} from './types';

/** Storage shape of a finished run: dates as ISO strings, everything else plain JSON. */
export interface WorkflowResultRecord {
  workflowId: string;
  ruleId: string;
  status: WorkflowStatus;
  stepsCompleted: WorkflowStep[];
  stepsFailed: WorkflowStep[];
  errors: string[];
  articleId: string | null;
  wordpressPostId: number | null;
  socialMediaPosts: SocialPostReference[];
  startedAt: string;
  completedAt?: string;
  failedAt?: string;
  metrics: WorkflowMetrics;
}

const STATUSES: readonly WorkflowStatus[] = ['pending', 'running', 'completed', 'failed', 'paused'];

const STEPS: readonly WorkflowStep[] = [
  'topic_management',
  'topic_selection',
  'content_generation',
  'image_acquisition',
  'publishing',
  'social_posting',
  'metrics_update',
];

const PLATFORMS: readonly SocialPlatform[] = ['linkedin', 'facebook'];

export function isWorkflowStep(value: string): value is WorkflowStep {
  return STEPS.some(step => step === value);
}

function isWorkflowStatus(value: string): value is WorkflowStatus {
  return STATUSES.some(status => status === value);
}

function isSocialPlatform(value: string): value is SocialPlatform {
  return PLATFORMS.some(platform => platform === value);
}

export function serializeWorkflowResult(result: WorkflowResult): WorkflowResultRecord {
  const record: WorkflowResultRecord = {
    workflowId: result.workflowId,
    ruleId: result.ruleId,
    status: result.status,
    stepsCompleted: [...result.stepsCompleted],
    stepsFailed: [...result.stepsFailed],
    errors: [...result.errors],
    articleId: result.articleId,
    wordpressPostId: result.wordpressPostId,
    socialMediaPosts: result.socialMediaPosts.map(post => ({ ...post })),
    startedAt: result.startedAt.toISOString(),
    metrics: { ...result.metrics },
  };
  if (result.completedAt) {
    record.completedAt = result.completedAt.toISOString();
  }
  if (result.failedAt) {
    record.failedAt = result.failedAt.toISOString();
  }
  return record;
}

function parseDate(value: string | undefined, field: string): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid ${field} timestamp: ${value}`);
  }
  return date;
}

function parseSteps(record: JsonRecord, key: string): WorkflowStep[] {
  return readStringArray(record, key).map(step => {
    if (!isWorkflowStep(step)) {
      throw new ValidationError(`Unknown workflow step "${step}" in ${key}`);
    }
    return step;
  });
}

function parseMetrics(raw: unknown): WorkflowMetrics {
  const metrics = isRecord(raw) ? raw : {};
  return {
    executionTimeSeconds: readNumber(metrics, 'executionTimeSeconds'),
    stepsCompleted: readNumber(metrics, 'stepsCompleted'),
    stepsFailed: readNumber(metrics, 'stepsFailed'),
    successRate: readNumber(metrics, 'successRate'),
    articleGenerated: readBoolean(metrics, 'articleGenerated'),
    wordpressPublished: readBoolean(metrics, 'wordpressPublished'),
    socialPostsCreated: readNumber(metrics, 'socialPostsCreated'),
    generationAttempts: readNumber(metrics, 'generationAttempts'),
    validationWarnings: readNumber(metrics, 'validationWarnings'),
  };
}

/**
 * Rebuilds a frozen WorkflowResult from a stored record. Accepts `unknown`
 * because records come straight back from DynamoDB.
 */
export function deserializeWorkflowResult(raw: unknown): WorkflowResult {
  if (!isRecord(raw)) {
    throw new ValidationError('Workflow result record must be an object');
  }

  const status = readString(raw, 'status');
  if (!isWorkflowStatus(status)) {
    throw new ValidationError(`Unknown workflow status "${status}"`);
  }

  const startedAt = parseDate(readOptionalString(raw, 'startedAt'), 'startedAt');
  if (!startedAt) {
    throw new ValidationError('Workflow result record is missing startedAt');
  }

  const socialMediaPosts: SocialPostReference[] = readRecordArray(raw, 'socialMediaPosts').flatMap(post => {
    const platform = readString(post, 'platform');
    if (!isSocialPlatform(platform)) {
      return [];
    }
    return [{ platform, postId: readOptionalString(post, 'postId'), url: readOptionalString(post, 'url') }];
  });

  const articleId = readOptionalString(raw, 'articleId');
  const wordpressPostId = readOptionalNumber(raw, 'wordpressPostId');

  return Object.freeze({
    workflowId: readString(raw, 'workflowId'),
    ruleId: readString(raw, 'ruleId'),
    status,
    stepsCompleted: Object.freeze(parseSteps(raw, 'stepsCompleted')),
    stepsFailed: Object.freeze(parseSteps(raw, 'stepsFailed')),
    errors: Object.freeze(readStringArray(raw, 'errors')),
    articleId: articleId ?? null,
    wordpressPostId: wordpressPostId ?? null,
    socialMediaPosts: Object.freeze(socialMediaPosts),
    startedAt,
    completedAt: parseDate(readOptionalString(raw, 'completedAt'), 'completedAt'),
    failedAt: parseDate(readOptionalString(raw, 'failedAt'), 'failedAt'),
    metrics: Object.freeze(parseMetrics(raw.metrics)),
  });
}
