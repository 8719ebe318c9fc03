import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { COMPLETION_RETRY_CONFIG, ErrorHandler, RetryConfig } from '../utils/error-handler';
import { isRecord, readRecordArray, readString } from '../utils/json';

export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionClient {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Raised for failures that retrying cannot fix: bad credentials, a rejected
 * request body, an unknown model.
 */
export class CompletionRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CompletionRejectedError';
  }
}

const NON_RETRYABLE = ['AccessDeniedException', 'ValidationException', 'ResourceNotFoundException', 'UnrecognizedClientException'];

export function isRejection(error: Error): boolean {
  return error instanceof CompletionRejectedError || NON_RETRYABLE.includes(error.name);
}

export interface BedrockCompletionClientOptions {
  client?: BedrockRuntimeClient;
  modelId: string;
  errorHandler?: ErrorHandler;
  retryConfig?: RetryConfig;
}

export class BedrockCompletionClient implements CompletionClient {
  private readonly client: BedrockRuntimeClient;
  private readonly modelId: string;
  private readonly errorHandler: ErrorHandler;
  private readonly retryConfig: RetryConfig;

  constructor(options: BedrockCompletionClientOptions) {
    this.client = options.client ?? new BedrockRuntimeClient({ region: process.env.AWS_REGION });
    this.modelId = options.modelId;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.retryConfig = options.retryConfig ?? COMPLETION_RETRY_CONFIG;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const modelId = request.model ?? this.modelId;
    const body = {
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: request.maxTokens ?? 4000,
      temperature: request.temperature ?? 0.7,
      ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
      messages: [{ role: 'user', content: request.prompt }],
    };

    try {
      return await this.errorHandler.retryWithBackoff(
        () => this.invoke(modelId, body, signal),
        {
          ...this.retryConfig,
          // an aborted attempt must not be retried behind the caller's back
          isRetryable: error => !signal?.aborted && !isRejection(error) && this.errorHandler.isRetryableError(error),
        },
        { functionName: 'blog-automation', operation: 'bedrock_invoke_model', metadata: { modelId } }
      );
    } catch (error) {
      if (error instanceof Error && NON_RETRYABLE.includes(error.name)) {
        throw new CompletionRejectedError(`${error.name}: ${error.message}`);
      }
      throw error;
    }
  }

  private async invoke(modelId: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    console.log(`Invoking Bedrock model ${modelId}`);
    const response = await this.client.send(
      new InvokeModelCommand({
        modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify(body),
      }),
      { abortSignal: signal }
    );

    const payload: unknown = JSON.parse(new TextDecoder().decode(response.body));
    if (!isRecord(payload)) {
      throw new Error('Bedrock returned a non-object payload');
    }

    const text = readRecordArray(payload, 'content')
      .filter(block => readString(block, 'type') === 'text')
      .map(block => readString(block, 'text'))
      .join('');

    console.log(`Bedrock response length: ${text.length} characters`);
    return text;
  }
}
