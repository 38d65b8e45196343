import { NotificationService, NotificationType, buildDecisionNotification } from './NotificationService';
import { ApprovalDecision } from '../../models/time-attendance/ApprovalStateMachine';
import { TaskEntry } from '../../models/time-attendance/TaskEntry';
import { LeaveRequest } from '../../models/time-attendance/LeaveRequest';
import { logger } from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    http: jest.fn(),
    debug: jest.fn()
  }
}));

const reviewedAt = new Date('2026-02-11T15:30:00Z');

const entry = TaskEntry.createDraft(
  'user-1',
  '2026-02-10',
  [
    { clientId: 'client-a', description: 'Support', hours: 5 },
    { clientId: 'client-b', description: 'Review', hours: 2.5 }
  ],
  'user-1',
  reviewedAt
);

function decisionFor(recordId: string, outcome: ApprovalDecision['outcome'], comment?: string): ApprovalDecision {
  return { outcome, recordId, ownerId: 'user-1', actorId: 'admin-1', timestamp: reviewedAt, comment };
}

describe('NotificationService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('buildDecisionNotification', () => {
    it('should describe an approved task entry', () => {
      const notification = buildDecisionNotification({ kind: 'TASK_ENTRY', record: entry }, decisionFor(entry.id, 'APPROVED'));

      expect(notification).toMatchObject({
        type: NotificationType.TASK_ENTRY_APPROVED,
        recipientId: 'user-1',
        title: 'Task Entry Approved',
        message: 'Your task entry for 2026-02-10 (7.5 hours) has been approved.',
        actionUrl: `/task-entries/${entry.id}`,
        data: { recordId: entry.id, reviewedBy: 'admin-1', reviewedAt: '2026-02-11T15:30:00.000Z' }
      });
    });

    it('should include the reviewer comment on a rejected leave request', () => {
      const request = LeaveRequest.createDraft('user-1', '2026-03-01', '2026-03-03', 'Holiday', 'user-1', reviewedAt);
      const notification = buildDecisionNotification(
        { kind: 'LEAVE_REQUEST', record: request },
        decisionFor(request.id, 'REJECTED', 'Release week')
      );

      expect(notification.type).toBe(NotificationType.LEAVE_REQUEST_REJECTED);
      expect(notification.title).toBe('Leave Request Rejected');
      expect(notification.message).toBe(
        'Your leave request for 2026-03-01 to 2026-03-03 (3 days) has been rejected. Comment: Release week'
      );
      expect(notification.data.comment).toBe('Release week');
    });

    it('should name a single day of leave once', () => {
      const request = LeaveRequest.createDraft('user-1', '2026-03-02', '2026-03-02', 'Appointment', 'user-1', reviewedAt, 2);
      const notification = buildDecisionNotification({ kind: 'LEAVE_REQUEST', record: request }, decisionFor(request.id, 'APPROVED'));

      expect(notification.message).toBe('Your leave request for 2026-03-02 (1 day) has been approved.');
    });
  });

  describe('notifyDecision', () => {
    it('should log the notification and report success', async () => {
      const service = new NotificationService();

      const result = await service.notifyDecision({ kind: 'TASK_ENTRY', record: entry }, decisionFor(entry.id, 'REJECTED'));

      expect(result.success).toBe(true);
      expect(result.recipientId).toBe('user-1');
      expect(logger.info).toHaveBeenCalledWith('Notification sent', {
        notificationId: result.notificationId,
        type: NotificationType.TASK_ENTRY_REJECTED,
        recipientId: 'user-1',
        title: 'Task Entry Rejected',
        recordId: entry.id
      });
    });
  });
});
