import { CloudWatchClient, PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { TOTAL_WORKFLOW_STEPS, WorkflowMetrics, WorkflowResult, WorkflowStep } from './types';

export interface MetricsInput {
  startedAt: Date;
  finishedAt: Date;
  stepsCompleted: readonly WorkflowStep[];
  stepsFailed: readonly WorkflowStep[];
  articleId: string | null;
  wordpressPostId: number | null;
  socialPostsCreated: number;
  generationAttempts: number;
  validationWarnings: number;
}

export function computeWorkflowMetrics(input: MetricsInput): WorkflowMetrics {
  const elapsedMs = Math.max(0, input.finishedAt.getTime() - input.startedAt.getTime());
  return {
    executionTimeSeconds: elapsedMs / 1000,
    stepsCompleted: input.stepsCompleted.length,
    stepsFailed: input.stepsFailed.length,
    successRate: (input.stepsCompleted.length / TOTAL_WORKFLOW_STEPS) * 100,
    articleGenerated: input.articleId !== null,
    wordpressPublished: input.wordpressPostId !== null,
    socialPostsCreated: input.socialPostsCreated,
    generationAttempts: input.generationAttempts,
    validationWarnings: input.validationWarnings,
  };
}

export interface MetricsSink {
  publish(result: WorkflowResult): Promise<void>;
}

export class CloudWatchMetricsSink implements MetricsSink {
  private readonly cloudWatchClient: CloudWatchClient;

  constructor(cloudWatchClient?: CloudWatchClient, private readonly namespace: string = 'BlogAutomation/Workflow') {
    this.cloudWatchClient = cloudWatchClient ?? new CloudWatchClient({ region: process.env.AWS_REGION });
  }

  async publish(result: WorkflowResult): Promise<void> {
    const dimensions = [{ Name: 'RuleId', Value: result.ruleId }];
    const timestamp = result.completedAt ?? result.failedAt ?? new Date();
    const { metrics } = result;

    const datum = (name: string, value: number, unit: StandardUnit) => ({
      MetricName: name,
      Value: value,
      Unit: unit,
      Dimensions: dimensions,
      Timestamp: timestamp,
    });

    await this.cloudWatchClient.send(new PutMetricDataCommand({
      Namespace: this.namespace,
      MetricData: [
        datum('WorkflowExecutionTime', metrics.executionTimeSeconds, StandardUnit.Seconds),
        datum('WorkflowSuccess', result.status === 'completed' ? 1 : 0, StandardUnit.Count),
        datum('StepsCompleted', metrics.stepsCompleted, StandardUnit.Count),
        datum('StepsFailed', metrics.stepsFailed, StandardUnit.Count),
        datum('SuccessRate', metrics.successRate, StandardUnit.Percent),
        datum('ArticlesPublished', metrics.wordpressPublished ? 1 : 0, StandardUnit.Count),
        datum('SocialPostsCreated', metrics.socialPostsCreated, StandardUnit.Count),
        datum('GenerationAttempts', metrics.generationAttempts, StandardUnit.Count),
        datum('ValidationWarnings', metrics.validationWarnings, StandardUnit.Count),
      ],
    }));
  }
}
