import { CloudWatchClient, PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { SNSClient, PublishCommand } from '@aws-sdk/client-sns';

export interface ErrorContext {
  functionName: string;
  workflowId?: string;
  ruleId?: string;
  articleId?: string;
  operation?: string;
  metadata?: Record<string, unknown>;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number; // milliseconds
  backoffMultiplier: number;
  isRetryable?: (error: Error) => boolean;
}

export interface ErrorHandlerOptions {
  cloudWatchClient?: CloudWatchClient;
  snsClient?: SNSClient;
  alertTopicArn?: string;
  namespace?: string;
}

export class ErrorHandler {
  private cloudWatchClient: CloudWatchClient;
  private snsClient: SNSClient;
  private alertTopicArn?: string;
  private namespace: string;

  constructor(options: ErrorHandlerOptions = {}) {
    this.cloudWatchClient = options.cloudWatchClient ?? new CloudWatchClient({ region: process.env.AWS_REGION });
    this.snsClient = options.snsClient ?? new SNSClient({ region: process.env.AWS_REGION });
    this.alertTopicArn = options.alertTopicArn ?? process.env.ALERT_TOPIC_ARN;
    this.namespace = options.namespace ?? 'BlogAutomation/Errors';
  }

  /**
   * Handle and log errors with context. Critical errors raise an alert unless
   * the caller sends its own.
   */
  async handleError(error: Error, context: ErrorContext, options: { alert?: boolean } = {}): Promise<void> {
    const errorInfo = {
      timestamp: new Date().toISOString(),
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      context,
    };

    console.error('Error occurred:', JSON.stringify(errorInfo, null, 2));

    await this.sendErrorMetrics(error, context);

    if (options.alert !== false && this.isCriticalError(error)) {
      await this.sendAlert(`CRITICAL: Error in ${context.functionName}`, {
        severity: 'CRITICAL',
        error: { type: error.name, message: error.message },
        context,
      });
    }
  }

  /**
   * Retry function with exponential backoff
   */
  async retryWithBackoff<T>(
    operation: () => Promise<T>,
    config: RetryConfig,
    context: ErrorContext
  ): Promise<T> {
    let lastError: Error = new Error(`Operation ${context.operation ?? 'unknown'} was not attempted`);

    for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
      try {
        if (attempt > 0) {
          const delay = this.calculateDelay(attempt, config);
          console.log(`Retry attempt ${attempt}/${config.maxRetries} after ${Math.round(delay)}ms delay`);
          await this.sleep(delay);
        }

        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        console.warn(`Attempt ${attempt + 1} failed:`, {
          error: lastError.message,
          operation: context.operation,
          workflowId: context.workflowId,
          attempt: attempt + 1,
          maxRetries: config.maxRetries,
        });

        const retryable = config.isRetryable
          ? config.isRetryable(lastError)
          : this.isRetryableError(lastError);
        if (!retryable) {
          console.error('Non-retryable error encountered:', lastError.message);
          break;
        }

        if (attempt === config.maxRetries) {
          break;
        }
      }
    }

    await this.handleError(lastError, {
      ...context,
      operation: 'retry_exhausted',
      metadata: {
        ...context.metadata,
        failedOperation: context.operation,
        maxRetries: config.maxRetries,
      },
    });

    throw lastError;
  }

  /**
   * Publish an alert to the configured SNS topic. Alerting never throws.
   */
  async sendAlert(subject: string, payload: Record<string, unknown>): Promise<void> {
    if (!this.alertTopicArn) {
      console.warn('Alert topic ARN not configured, skipping alert');
      return;
    }

    try {
      await this.snsClient.send(new PublishCommand({
        TopicArn: this.alertTopicArn,
        Subject: subject.substring(0, 100),
        Message: JSON.stringify({
          timestamp: new Date().toISOString(),
          service: 'BlogAutomation',
          ...payload,
        }, null, 2),
      }));
    } catch (alertError) {
      console.error('Failed to send alert:', alertError);
    }
  }

  isRetryableError(error: Error): boolean {
    const retryableErrors = [
      'ThrottlingException',
      'ProvisionedThroughputExceededException',
      'ServiceUnavailable',
      'ModelNotReadyException',
      'InternalServerError',
      'InternalServerException',
      'RequestTimeout',
      'TimeoutError',
      'NetworkingError',
      'ECONNRESET',
      'ETIMEDOUT',
      'ENOTFOUND',
      '429',
      '502',
      '503',
    ];

    return retryableErrors.some(retryableError =>
      error.name.includes(retryableError) || error.message.includes(retryableError)
    );
  }

  private async sendErrorMetrics(error: Error, context: ErrorContext): Promise<void> {
    try {
      const dimensions = [
        { Name: 'FunctionName', Value: context.functionName },
        { Name: 'ErrorType', Value: error.name },
      ];

      if (context.operation) {
        dimensions.push({ Name: 'Operation', Value: context.operation });
      }

      await this.cloudWatchClient.send(new PutMetricDataCommand({
        Namespace: this.namespace,
        MetricData: [
          {
            MetricName: 'ErrorCount',
            Value: 1,
            Unit: StandardUnit.Count,
            Dimensions: dimensions,
            Timestamp: new Date(),
          },
        ],
      }));
    } catch (metricsError) {
      console.error('Failed to send error metrics:', metricsError);
    }
  }

  isCriticalError(error: Error): boolean {
    const criticalErrors = [
      'DynamoDBServiceException',
      'S3ServiceException',
      'BedrockRuntimeServiceException',
      'AccessDeniedException',
      'ConfigurationError',
    ];

    return criticalErrors.some(criticalError =>
      error.name.includes(criticalError) || error.message.includes(criticalError)
    );
  }

  private calculateDelay(attempt: number, config: RetryConfig): number {
    const exponentialDelay = config.baseDelay * Math.pow(config.backoffMultiplier, attempt - 1);
    const jitteredDelay = exponentialDelay * (0.5 + Math.random() * 0.5);
    return Math.min(jitteredDelay, config.maxDelay);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class GenerationTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Content generation timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'GenerationTimeoutError';
  }
}

// Completion calls back off 2s, 4s, 8s before giving up
export const COMPLETION_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelay: 2000,
  maxDelay: 12000,
  backoffMultiplier: 2,
};

export const STORAGE_RETRY_CONFIG: RetryConfig = {
  maxRetries: 1,
  baseDelay: 250,
  maxDelay: 1000,
  backoffMultiplier: 2,
  isRetryable: () => true,
};
