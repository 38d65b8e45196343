import { v4 as uuidv4 } from 'uuid';
import { ApprovalDecision } from '../../models/time-attendance/ApprovalStateMachine';
import { TaskEntry } from '../../models/time-attendance/TaskEntry';
import { LeaveRequest } from '../../models/time-attendance/LeaveRequest';
import { formatHours } from '../../models/time-attendance/RuleViolation';
import { logger } from '../../utils/logger';

export enum NotificationType {
  TASK_ENTRY_APPROVED = 'TASK_ENTRY_APPROVED',
  TASK_ENTRY_REJECTED = 'TASK_ENTRY_REJECTED',
  LEAVE_REQUEST_APPROVED = 'LEAVE_REQUEST_APPROVED',
  LEAVE_REQUEST_REJECTED = 'LEAVE_REQUEST_REJECTED'
}

export interface NotificationPayload {
  id: string;
  type: NotificationType;
  recipientId: string;
  title: string;
  message: string;
  data: {
    recordId: string;
    reviewedBy: string;
    reviewedAt: string;
    comment?: string;
  };
  actionUrl: string;
}

export interface NotificationResult {
  notificationId: string;
  recipientId: string;
  sentAt: Date;
  success: boolean;
  error?: string;
}

export type DecisionSubject =
  | { kind: 'TASK_ENTRY'; record: TaskEntry }
  | { kind: 'LEAVE_REQUEST'; record: LeaveRequest };

/**
 * Receives every committed approve/reject decision. Delivery failures are
 * the notifier's to report; they never undo the decision.
 */
export interface TimesheetNotifier {
  notifyDecision(subject: DecisionSubject, decision: ApprovalDecision): Promise<NotificationResult>;
}

function commentSuffix(comment?: string): string {
  return comment ? ` Comment: ${comment}` : '';
}

export function buildDecisionNotification(subject: DecisionSubject, decision: ApprovalDecision): NotificationPayload {
  const verb = decision.outcome === 'APPROVED' ? 'approved' : 'rejected';
  const data = {
    recordId: decision.recordId,
    reviewedBy: decision.actorId,
    reviewedAt: decision.timestamp.toISOString(),
    comment: decision.comment
  };

  if (subject.kind === 'TASK_ENTRY') {
    const entry = subject.record;
    return {
      id: uuidv4(),
      type: decision.outcome === 'APPROVED' ? NotificationType.TASK_ENTRY_APPROVED : NotificationType.TASK_ENTRY_REJECTED,
      recipientId: decision.ownerId,
      title: `Task Entry ${decision.outcome === 'APPROVED' ? 'Approved' : 'Rejected'}`,
      message: `Your task entry for ${entry.workDate} (${formatHours(entry.totalHours)} hours) has been ${verb}.${commentSuffix(decision.comment)}`,
      data,
      actionUrl: `/task-entries/${entry.id}`
    };
  }

  const request = subject.record;
  const range = request.startDate === request.endDate
    ? request.startDate
    : `${request.startDate} to ${request.endDate}`;

  return {
    id: uuidv4(),
    type: decision.outcome === 'APPROVED' ? NotificationType.LEAVE_REQUEST_APPROVED : NotificationType.LEAVE_REQUEST_REJECTED,
    recipientId: decision.ownerId,
    title: `Leave Request ${decision.outcome === 'APPROVED' ? 'Approved' : 'Rejected'}`,
    message: `Your leave request for ${range} (${request.totalDays} ${request.totalDays === 1 ? 'day' : 'days'}) has been ${verb}.${commentSuffix(decision.comment)}`,
    data,
    actionUrl: `/leave-requests/${request.id}`
  };
}

/**
 * In-app notifier that records each notification in the application log.
 * Email and push delivery are left to whatever consumes those entries.
 */
export class NotificationService implements TimesheetNotifier {
  async notifyDecision(subject: DecisionSubject, decision: ApprovalDecision): Promise<NotificationResult> {
    const notification = buildDecisionNotification(subject, decision);
    return this.sendNotification(notification);
  }

  private async sendNotification(notification: NotificationPayload): Promise<NotificationResult> {
    logger.info('Notification sent', {
      notificationId: notification.id,
      type: notification.type,
      recipientId: notification.recipientId,
      title: notification.title,
      recordId: notification.data.recordId
    });

    return {
      notificationId: notification.id,
      recipientId: notification.recipientId,
      sentAt: new Date(),
      success: true
    };
  }
}
