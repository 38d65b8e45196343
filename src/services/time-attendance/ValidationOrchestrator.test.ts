import { ValidationOrchestrator, Decision, TaskEntryContext } from './ValidationOrchestrator';
import { TaskEntry } from '../../models/time-attendance/TaskEntry';
import { LeaveRequest } from '../../models/time-attendance/LeaveRequest';
import { createTimesheetPolicy } from '../../models/time-attendance/TimesheetPolicy';
import { Actor } from '../../models/User';
import { fixedClock } from '../../utils/clock';

const now = new Date('2026-02-10T12:00:00Z');
const owner: Actor = { id: 'user-1', role: 'EMPLOYEE' };
const admin: Actor = { id: 'admin-1', role: 'ADMIN' };

const emptyTaskContext: TaskEntryContext = { entriesForDay: [], leaveForOwner: [] };
const emptyLeaveContext = { leaveForOwner: [], taskEntriesForOwner: [] };

function accepted<T>(decision: Decision<T>): T {
  if (!decision.accepted) {
    throw new Error(`Expected an accepted decision, got ${JSON.stringify(decision.violations)}`);
  }
  return decision.record;
}

function work(hours: number, clientId: string = 'client-a') {
  return { clientId, description: 'Support', hours };
}

describe('ValidationOrchestrator', () => {
  const orchestrator = new ValidationOrchestrator(fixedClock(now));

  function draft(hours: number[], workDate: string = '2026-02-10'): TaskEntry {
    return accepted(orchestrator.createTaskEntry({ workDate, subTasks: hours.map(value => work(value)) }, owner, emptyTaskContext));
  }

  describe('task entries', () => {
    it('should create a draft owned and stamped by the actor', () => {
      const entry = draft([3, 4]);

      expect(entry.ownerId).toBe('user-1');
      expect(entry.createdBy).toBe('user-1');
      expect(entry.createdAt).toEqual(now);
      expect(entry.status).toBe('DRAFT');
      expect(entry.totalHours).toBe(7);
    });

    it('should turn malformed hours into a rejected decision', () => {
      expect(orchestrator.createTaskEntry({ workDate: '2026-02-10', subTasks: [work(-1)] }, owner, emptyTaskContext)).toEqual({
        accepted: false,
        violations: [{ code: 'INVALID_HOURS', hours: -1, reason: 'NEGATIVE', subTaskIndex: 0 }]
      });
    });

    it('should report a single oversized sub-task as a breach of the daily limit', () => {
      expect(orchestrator.createTaskEntry({ workDate: '2026-02-10', subTasks: [work(25)] }, owner, emptyTaskContext)).toEqual({
        accepted: false,
        violations: [{ code: 'DAILY_HOURS_EXCEEDED', date: '2026-02-10', attempted: 25, limit: 8 }]
      });
    });

    it('should reject growing an entry past the daily limit', () => {
      const first = draft([3, 4]);
      const decision = orchestrator.updateTaskEntry(
        first,
        { subTasks: [work(3), work(4), work(2)] },
        owner,
        { entriesForDay: [first], leaveForOwner: [] }
      );

      expect(decision).toEqual({
        accepted: false,
        violations: [{ code: 'DAILY_HOURS_EXCEEDED', date: '2026-02-10', attempted: 9, limit: 8 }]
      });
    });

    it('should combine hour, leave and client checks', () => {
      const decision = orchestrator.createTaskEntry(
        { workDate: '2026-03-03', subTasks: [work(2, 'client-x')] },
        owner,
        {
          entriesForDay: [],
          leaveForOwner: [{ id: 'leave-1', ownerId: 'user-1', status: 'APPROVED', startDate: '2026-03-01', endDate: '2026-03-05' }],
          activeClientIds: new Set(['client-a'])
        }
      );

      expect(decision).toEqual({
        accepted: false,
        violations: [
          { code: 'TASK_LEAVE_CONFLICT', date: '2026-03-03', leaveRequestId: 'leave-1' },
          { code: 'UNKNOWN_CLIENT', clientId: 'client-x', subTaskIndex: 0 }
        ]
      });
    });

    it('should only let the owner edit a draft', () => {
      const entry = draft([2]);

      expect(orchestrator.updateTaskEntry(entry, { subTasks: [work(1)] }, admin, emptyTaskContext)).toEqual({
        accepted: false,
        violations: [{ code: 'FORBIDDEN', actorId: 'admin-1', event: 'update', reason: 'OWNERSHIP' }]
      });
    });

    it('should refuse edits once submitted', () => {
      const submitted = accepted(orchestrator.submitTaskEntry(draft([2]), owner, emptyTaskContext));

      expect(orchestrator.updateTaskEntry(submitted, { subTasks: [work(1)] }, owner, emptyTaskContext)).toEqual({
        accepted: false,
        violations: [{ code: 'INVALID_TRANSITION', recordId: submitted.id, from: 'SUBMITTED', event: 'update' }]
      });
    });

    it('should refuse to submit an empty draft', () => {
      const empty = draft([]);

      expect(orchestrator.submitTaskEntry(empty, owner, emptyTaskContext)).toEqual({
        accepted: false,
        violations: [{ code: 'EMPTY_SUBTASK_SET', entryId: empty.id }]
      });
    });

    it('should re-check the day on submission', () => {
      const pending = draft([5]);
      const other = draft([4]);

      expect(orchestrator.submitTaskEntry(pending, owner, { entriesForDay: [other, pending], leaveForOwner: [] })).toEqual({
        accepted: false,
        violations: [{ code: 'DAILY_HOURS_EXCEEDED', date: '2026-02-10', attempted: 9, limit: 8 }]
      });
    });

    it('should approve a submitted entry and report the decision', () => {
      const submitted = accepted(orchestrator.submitTaskEntry(draft([2]), owner, emptyTaskContext));
      const decision = orchestrator.approveTaskEntry(submitted, admin, 'ok');

      expect(decision.accepted).toBe(true);
      if (decision.accepted) {
        expect(decision.record.status).toBe('APPROVED');
        expect(decision.record.version).toBe(2);
        expect(decision.decision).toEqual({
          outcome: 'APPROVED',
          recordId: submitted.id,
          ownerId: 'user-1',
          actorId: 'admin-1',
          timestamp: now,
          comment: 'ok'
        });
      }
    });

    it('should remove a draft on delete', () => {
      const entry = draft([1]);

      expect(orchestrator.deleteTaskEntry(entry, owner)).toEqual({
        accepted: true,
        record: entry,
        removed: true,
        decision: undefined
      });
    });

    it('should revalidate a stored record without changing it', () => {
      const submitted = accepted(orchestrator.submitTaskEntry(draft([2]), owner, emptyTaskContext));
      const approved = accepted(orchestrator.approveTaskEntry(submitted, admin));
      const target = { kind: 'TASK_ENTRY' as const, record: approved, context: { entriesForDay: [approved], leaveForOwner: [] } };

      const first = orchestrator.revalidate(target);
      const second = orchestrator.revalidate(target);

      expect(first).toEqual(second);
      expect(accepted(first)).toBe(approved);
      expect(approved.status).toBe('APPROVED');
      expect(approved.version).toBe(2);
    });

    describe('reviseRejectedTaskEntry', () => {
      function rejectedEntry(): TaskEntry {
        const submitted = accepted(orchestrator.submitTaskEntry(draft([2, 1.5]), owner, emptyTaskContext));
        return accepted(orchestrator.rejectTaskEntry(submitted, admin, 'Split by client'));
      }

      it('should copy the content into a fresh draft', () => {
        const rejected = rejectedEntry();
        const revised = accepted(orchestrator.reviseRejectedTaskEntry(rejected, owner, { entriesForDay: [rejected], leaveForOwner: [] }));

        expect(revised.id).not.toBe(rejected.id);
        expect(revised.status).toBe('DRAFT');
        expect(revised.version).toBe(0);
        expect(revised.workDate).toBe(rejected.workDate);
        expect(revised.subTasks.map(subTask => subTask.hours)).toEqual([2, 1.5]);
        expect(revised.reviewComment).toBeUndefined();
      });

      it('should only revise rejected entries', () => {
        const pending = draft([2]);

        expect(orchestrator.reviseRejectedTaskEntry(pending, owner, emptyTaskContext)).toEqual({
          accepted: false,
          violations: [{ code: 'INVALID_TRANSITION', recordId: pending.id, from: 'DRAFT', event: 'resubmit' }]
        });
      });

      it('should only let the owner revise', () => {
        expect(orchestrator.reviseRejectedTaskEntry(rejectedEntry(), admin, emptyTaskContext)).toEqual({
          accepted: false,
          violations: [{ code: 'FORBIDDEN', actorId: 'admin-1', event: 'resubmit', reason: 'OWNERSHIP' }]
        });
      });
    });
  });

  describe('leave requests', () => {
    function leaveDraft(startDate: string, endDate: string): LeaveRequest {
      return accepted(orchestrator.createLeaveRequest({ startDate, endDate, reason: 'Holiday' }, owner, emptyLeaveContext));
    }

    it('should turn an inverted range into a rejected decision', () => {
      expect(orchestrator.createLeaveRequest(
        { startDate: '2026-03-05', endDate: '2026-03-01', reason: 'Holiday' },
        owner,
        emptyLeaveContext
      )).toEqual({
        accepted: false,
        violations: [{ code: 'INVALID_RANGE', startDate: '2026-03-05', endDate: '2026-03-01' }]
      });
    });

    it('should reject overlapping leave', () => {
      const existing = leaveDraft('2026-03-01', '2026-03-05');

      expect(orchestrator.createLeaveRequest(
        { startDate: '2026-03-04', endDate: '2026-03-06', reason: 'Holiday' },
        owner,
        { leaveForOwner: [existing], taskEntriesForOwner: [] }
      )).toEqual({
        accepted: false,
        violations: [{ code: 'LEAVE_OVERLAP', conflictingId: existing.id, startDate: '2026-03-01', endDate: '2026-03-05' }]
      });
    });

    it('should move its own dates without conflicting with itself', () => {
      const existing = leaveDraft('2026-03-01', '2026-03-05');
      const moved = accepted(orchestrator.updateLeaveRequest(
        existing,
        { startDate: '2026-03-02', endDate: '2026-03-06' },
        owner,
        { leaveForOwner: [existing], taskEntriesForOwner: [] }
      ));

      expect(moved.id).toBe(existing.id);
      expect(moved.totalDays).toBe(5);
    });

    it('should reject leave over logged task hours on submission', () => {
      const request = leaveDraft('2026-03-01', '2026-03-05');
      const logged = draft([2], '2026-03-03');

      expect(orchestrator.submitLeaveRequest(request, owner, { leaveForOwner: [request], taskEntriesForOwner: [logged] })).toEqual({
        accepted: false,
        violations: [{ code: 'LEAVE_TASK_CONFLICT', date: '2026-03-03', taskEntryIds: [logged.id] }]
      });
    });

    it('should revise a rejected request into a new draft', () => {
      const submitted = accepted(orchestrator.submitLeaveRequest(leaveDraft('2026-03-01', '2026-03-02'), owner, emptyLeaveContext));
      const rejected = accepted(orchestrator.rejectLeaveRequest(submitted, admin));
      const revised = accepted(orchestrator.reviseRejectedLeaveRequest(rejected, owner, {
        leaveForOwner: [rejected],
        taskEntriesForOwner: []
      }));

      expect(revised.id).not.toBe(rejected.id);
      expect(revised.status).toBe('DRAFT');
      expect(revised.range).toEqual(rejected.range);
      expect(revised.reason).toBe('Holiday');
    });

    it('should require a rejection comment when the policy says so', () => {
      const strict = new ValidationOrchestrator(fixedClock(now), createTimesheetPolicy({ requireRejectionComment: true }));
      const submitted = accepted(strict.submitLeaveRequest(leaveDraft('2026-03-01', '2026-03-02'), owner, emptyLeaveContext));

      expect(strict.rejectLeaveRequest(submitted, admin)).toEqual({
        accepted: false,
        violations: [{ code: 'REVIEW_COMMENT_REQUIRED', recordId: submitted.id, event: 'reject' }]
      });
      expect(accepted(strict.rejectLeaveRequest(submitted, admin, 'Team offsite')).reviewComment).toBe('Team offsite');
    });

    it('should revalidate a leave request against the current snapshot', () => {
      const request = leaveDraft('2026-03-01', '2026-03-05');
      const logged = draft([1], '2026-03-02');

      expect(orchestrator.revalidate({
        kind: 'LEAVE_REQUEST',
        record: request,
        context: { leaveForOwner: [request], taskEntriesForOwner: [logged] }
      })).toEqual({
        accepted: false,
        violations: [{ code: 'LEAVE_TASK_CONFLICT', date: '2026-03-02', taskEntryIds: [logged.id] }]
      });
    });
  });
});
