import { v4 as uuidv4 } from 'uuid';
import { Notification, NotificationType } from '../workflow/types';
import { ErrorHandler } from './error-handler';

export interface NotificationStore {
  saveNotification(notification: Notification): Promise<void>;
}

export interface NotificationInput {
  title: string;
  message: string;
  type: NotificationType;
  ruleId?: string;
  workflowId?: string;
}

/**
 * Writes operator notifications and, for diagnostics, raises an SNS alert.
 * Neither path throws: a run must finish even when notifying fails.
 */
export class WorkflowNotifier {
  constructor(
    private readonly store: NotificationStore,
    private readonly errorHandler: ErrorHandler,
    private readonly now: () => Date = () => new Date()
  ) {}

  async notify(input: NotificationInput): Promise<void> {
    const notification: Notification = {
      id: uuidv4(),
      title: input.title,
      message: input.message,
      type: input.type,
      read: false,
      createdAt: this.now().toISOString(),
    };
    if (input.ruleId) {
      notification.ruleId = input.ruleId;
    }
    if (input.workflowId) {
      notification.workflowId = input.workflowId;
    }

    try {
      await this.store.saveNotification(notification);
    } catch (error) {
      console.error('Failed to create notification:', error instanceof Error ? error.message : String(error));
    }
  }

  /** Notification row plus error metric and a single alert for an unexpected failure. */
  async diagnose(error: Error, input: Omit<NotificationInput, 'type'>): Promise<void> {
    await this.notify({ ...input, type: 'error' });
    await this.errorHandler.handleError(error, {
      functionName: 'blog-automation',
      operation: 'workflow_run',
      workflowId: input.workflowId,
      ruleId: input.ruleId,
    }, { alert: false });
    await this.errorHandler.sendAlert(`Workflow failed: ${input.title}`, {
      severity: this.errorHandler.isCriticalError(error) ? 'CRITICAL' : 'HIGH',
      workflowId: input.workflowId,
      ruleId: input.ruleId,
      error: { type: error.name, message: error.message, stack: error.stack },
    });
  }
}
