import { SendMessageCommand, SQSClient } from '@aws-sdk/client-sqs';
import { ValidationError } from '../utils/error-handler';
import { isRecord } from '../utils/json';
import { errorMessage } from './result';

/** One pending run of a rule within its daily quota, 1-based. */
export interface QueuedRun {
  ruleId: string;
  run: number;
  quota: number;
}

export interface RunQueue {
  enqueue(run: QueuedRun): Promise<void>;
}

function positiveInteger(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : null;
}

export function parseQueuedRun(body: string): QueuedRun {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new ValidationError(`Queued run is not valid JSON: ${errorMessage(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ValidationError('Queued run must be an object');
  }

  const ruleId = parsed.ruleId;
  if (typeof ruleId !== 'string' || ruleId.trim() === '') {
    throw new ValidationError('Queued run is missing ruleId');
  }
  const run = positiveInteger(parsed.run);
  const quota = positiveInteger(parsed.quota);
  if (run === null || quota === null || run > quota) {
    throw new ValidationError(`Queued run for rule ${ruleId} has an invalid position ${String(parsed.run)}/${String(parsed.quota)}`);
  }

  return { ruleId, run, quota };
}

/** Sends each run to the queue the automation function consumes, one message per run. */
export class SqsRunQueue implements RunQueue {
  constructor(
    private readonly queueUrl: string,
    private readonly client: SQSClient = new SQSClient({ region: process.env.AWS_REGION })
  ) {}

  async enqueue(run: QueuedRun): Promise<void> {
    await this.client.send(new SendMessageCommand({
      QueueUrl: this.queueUrl,
      MessageBody: JSON.stringify(run),
      MessageAttributes: {
        ruleId: {
          StringValue: run.ruleId,
          DataType: 'String',
        },
      },
    }));
    console.log(`Queued run ${run.run}/${run.quota} of rule ${run.ruleId}`);
  }
}
