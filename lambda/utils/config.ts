import { ConfigurationError } from './error-handler';

export interface TableNames {
  blogs: string;
  rules: string;
  topics: string;
  articles: string;
  metrics: string;
  workflowRuns: string;
  notifications: string;
}

export interface AutomationConfig {
  region: string;
  tables: TableNames;
  imageBucketName: string;
  runQueueUrl: string;
  alertTopicArn?: string;
  bedrockModelId: string;
  pexelsApiKey?: string;
  unsplashAccessKey?: string;
  generationTimeoutSeconds: number;
  generationMaxRetries: number;
}

export type Environment = Record<string, string | undefined>;

const DEFAULT_MODEL_ID = 'anthropic.claude-3-5-sonnet-20240620-v1:0';

function required(env: Environment, name: string): string {
  const value = env[name];
  if (!value || value.trim() === '') {
    throw new ConfigurationError(`Missing required environment variable ${name}`);
  }
  return value;
}

function optional(env: Environment, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() !== '' ? value : undefined;
}

function integerSetting(env: Environment, name: string, fallback: number, minimum: number): number {
  const raw = optional(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new ConfigurationError(`${name} must be an integer of at least ${minimum}, got "${raw}"`);
  }
  return parsed;
}

/**
 * Reads the Lambda environment once. Table, bucket and queue names are injected
 * by the CDK stack; API keys are optional and disable their provider when absent.
 */
export function loadConfig(env: Environment = process.env): AutomationConfig {
  return {
    region: optional(env, 'AWS_REGION') ?? 'us-east-1',
    tables: {
      blogs: required(env, 'BLOGS_TABLE_NAME'),
      rules: required(env, 'RULES_TABLE_NAME'),
      topics: required(env, 'TOPICS_TABLE_NAME'),
      articles: required(env, 'ARTICLES_TABLE_NAME'),
      metrics: required(env, 'METRICS_TABLE_NAME'),
      workflowRuns: required(env, 'WORKFLOW_RUNS_TABLE_NAME'),
      notifications: required(env, 'NOTIFICATIONS_TABLE_NAME'),
    },
    imageBucketName: required(env, 'IMAGE_BUCKET_NAME'),
    runQueueUrl: required(env, 'RUN_QUEUE_URL'),
    alertTopicArn: optional(env, 'ALERT_TOPIC_ARN'),
    bedrockModelId: optional(env, 'BEDROCK_MODEL_ID') ?? DEFAULT_MODEL_ID,
    pexelsApiKey: optional(env, 'PEXELS_API_KEY'),
    unsplashAccessKey: optional(env, 'UNSPLASH_ACCESS_KEY'),
    generationTimeoutSeconds: integerSetting(env, 'GENERATION_TIMEOUT_SECONDS', 180, 1),
    generationMaxRetries: integerSetting(env, 'GENERATION_MAX_RETRIES', 2, 0),
  };
}
