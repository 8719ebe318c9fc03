import 'source-map-support/register';
import { ScheduledEvent, SQSEvent } from 'aws-lambda';
import { TopicGenerator } from './ai/topic-generator';
import { BedrockCompletionClient } from './ai/completion-client';
import { AuthorRotationManager } from './authors/author-rotation-manager';
import { RosterLoader, RosterProvider } from './authors/roster-provider';
import { ContentValidator } from './content/content-validator';
import { SeoTagGenerator } from './content/seo-tag-generator';
import { ImageAcquisitionService } from './images/image-acquisition';
import { ImageProvider, PexelsImageProvider, UnsplashImageProvider } from './images/image-providers';
import { PublishingAgentRegistry } from './publishing/publishing-agent-registry';
import { CmsAuthorDirectory, wordPressClientFactory } from './publishing/wordpress-client';
import { DynamoAutomationRepository } from './repositories/dynamo-automation-repository';
import { AutomationConfig, loadConfig } from './utils/config';
import { ErrorHandler } from './utils/error-handler';
import { isRecord } from './utils/json';
import { WorkflowNotifier } from './utils/notifier';
import { ContentGenerator } from './workflow/content-generator';
import { errorMessage } from './workflow/result';
import { parseQueuedRun, QueuedRun, RunQueue, SqsRunQueue } from './workflow/run-queue';
import { TopicSelector } from './workflow/topic-selector';
import { AutomationRule, WorkflowResult } from './workflow/types';
import { WorkflowEngine } from './workflow/workflow-engine';
import { CloudWatchMetricsSink } from './workflow/workflow-metrics';
import { serializeWorkflowResult, WorkflowResultRecord } from './workflow/workflow-result-codec';

export interface RunRuleEvent {
  ruleId: string;
}

export type AutomationEvent = RunRuleEvent | ScheduledEvent | SQSEvent;

/** What the handler needs from the engine. */
export interface WorkflowRunner {
  runById(ruleId: string): Promise<WorkflowResult>;
}

export interface RuleSource {
  listActiveAutomationRules(): Promise<AutomationRule[]>;
}

export interface AutomationRuntime {
  engine: WorkflowRunner;
  rules: RuleSource;
  queue: RunQueue;
}

export interface SweepSummary {
  rulesQueued: number;
  runsPlanned: number;
}

export function isRunRuleEvent(event: unknown): event is RunRuleEvent {
  if (!isRecord(event)) {
    return false;
  }
  const ruleId = event['ruleId'];
  return typeof ruleId === 'string' && ruleId.trim() !== '';
}

export function isQueueEvent(event: unknown): event is SQSEvent {
  return isRecord(event) && Array.isArray(event['Records']);
}

export interface RuntimeOptions {
  rosterLoader?: RosterLoader;
}

/**
 * Wires the production adapters around one WorkflowEngine. Author rosters are
 * loaded before the runtime is handed out.
 */
export async function createAutomationRuntime(config: AutomationConfig, options: RuntimeOptions = {}): Promise<AutomationRuntime> {
  const errorHandler = new ErrorHandler({ alertTopicArn: config.alertTopicArn });
  const repository = new DynamoAutomationRepository(config.tables);
  const completion = new BedrockCompletionClient({ modelId: config.bedrockModelId, errorHandler });

  const providers: ImageProvider[] = [];
  if (config.pexelsApiKey) {
    providers.push(new PexelsImageProvider(config.pexelsApiKey));
  }
  if (config.unsplashAccessKey) {
    providers.push(new UnsplashImageProvider(config.unsplashAccessKey));
  }
  if (providers.length === 0) {
    console.warn('No image provider keys configured, articles will be published without images');
  }

  const rosters = await RosterProvider.create({
    loader: options.rosterLoader,
    directory: new CmsAuthorDirectory(wordPressClientFactory),
  });

  const engine = new WorkflowEngine({
    repository,
    topicSelector: new TopicSelector(repository, new TopicGenerator(completion)),
    generator: new ContentGenerator(completion, { timeoutMs: config.generationTimeoutSeconds * 1000 }),
    validator: new ContentValidator(),
    tagGenerator: new SeoTagGenerator(),
    images: new ImageAcquisitionService({ bucketName: config.imageBucketName, providers }),
    cmsClientFactory: wordPressClientFactory,
    rotation: new AuthorRotationManager(rosters, repository),
    social: new PublishingAgentRegistry(),
    notifier: new WorkflowNotifier(repository, errorHandler),
    errorHandler,
    metricsSink: new CloudWatchMetricsSink(),
    maxRetries: config.generationMaxRetries,
  });

  return { engine, rules: repository, queue: new SqsRunQueue(config.runQueueUrl) };
}

let defaultRuntime: Promise<AutomationRuntime> | undefined;

function runtime(): Promise<AutomationRuntime> {
  if (!defaultRuntime) {
    defaultRuntime = createAutomationRuntime(loadConfig()).catch((error: unknown) => {
      defaultRuntime = undefined;
      throw error;
    });
  }
  return defaultRuntime;
}

export async function runAutomationRule(ruleId: string, engine?: WorkflowRunner): Promise<WorkflowResultRecord> {
  const runner = engine ?? (await runtime()).engine;
  const result = await runner.runById(ruleId);
  return serializeWorkflowResult(result);
}

/**
 * Queues the first run of every active rule. Each run executes in its own
 * invocation and queues the next one only after it completes, so a rule
 * stops for the day at its first run that does not complete.
 */
export async function runScheduledSweep(current: AutomationRuntime): Promise<SweepSummary> {
  const rules = await current.rules.listActiveAutomationRules();
  const summary: SweepSummary = { rulesQueued: 0, runsPlanned: 0 };

  for (const rule of rules) {
    const quota = Math.max(1, rule.dailyQuota);
    await current.queue.enqueue({ ruleId: rule.id, run: 1, quota });
    summary.rulesQueued++;
    summary.runsPlanned += quota;
  }

  console.log('Scheduled sweep queued', JSON.stringify(summary));
  return summary;
}

export async function runQueuedRun(message: QueuedRun, current: AutomationRuntime): Promise<WorkflowResultRecord> {
  const result = await current.engine.runById(message.ruleId);

  if (result.status !== 'completed') {
    console.warn(`Rule ${message.ruleId} stopped after run ${message.run}/${message.quota}: ${result.errors.join('; ')}`);
  } else if (message.run < message.quota) {
    await current.queue.enqueue({ ...message, run: message.run + 1 });
  }

  return serializeWorkflowResult(result);
}

export async function processQueueEvent(event: SQSEvent, current: AutomationRuntime): Promise<WorkflowResultRecord[]> {
  const records: WorkflowResultRecord[] = [];
  for (const record of event.Records) {
    const message = parseQueuedRun(record.body);
    console.log(`Processing run ${message.run}/${message.quota} of rule ${message.ruleId}`);
    records.push(await runQueuedRun(message, current));
  }
  return records;
}

export const handler = async (
  event: AutomationEvent
): Promise<WorkflowResultRecord | WorkflowResultRecord[] | SweepSummary> => {
  console.log('Automation event received:', JSON.stringify(event));

  try {
    if (isRunRuleEvent(event)) {
      return await runAutomationRule(event.ruleId);
    }
    if (isQueueEvent(event)) {
      return await processQueueEvent(event, await runtime());
    }
    return await runScheduledSweep(await runtime());
  } catch (error) {
    console.error('Automation handler failed:', errorMessage(error));
    throw error;
  }
};
