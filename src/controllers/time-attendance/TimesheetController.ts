import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { TimesheetService, ListQuery } from '../../services/time-attendance/TimesheetService';
import { APPROVAL_STATUSES } from '../../models/time-attendance/RuleViolation';
import { DATE_PRESETS } from '../../models/time-attendance/TimeAccounting';
import { FULL_DAY_LEAVE_HOURS } from '../../models/time-attendance/LeaveRequest';
import { requireActor } from '../../middleware/authenticate';
import { validateRequest } from '../../utils/validation';

const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format');

const subTaskSchema = z.object({
  clientId: z.string().trim().min(1).max(64),
  title: z.string().trim().max(255).optional(),
  description: z.string().max(500).default(''),
  hours: z.number()
});

const createTaskEntrySchema = z.object({
  workDate: calendarDate,
  subTasks: z.array(subTaskSchema).default([])
});

const updateTaskEntrySchema = z.object({
  workDate: calendarDate.optional(),
  subTasks: z.array(subTaskSchema).optional()
});

const createLeaveRequestSchema = z.object({
  startDate: calendarDate,
  endDate: calendarDate,
  reason: z.string().trim().min(1).max(1000),
  hoursPerDay: z.number().positive().max(FULL_DAY_LEAVE_HOURS).optional()
});

const updateLeaveRequestSchema = createLeaveRequestSchema.partial();

const reviewSchema = z.object({
  comment: z.string().max(500).optional()
});

const listQuerySchema = z.object({
  preset: z.enum(DATE_PRESETS).optional(),
  startDate: calendarDate.optional(),
  endDate: calendarDate.optional(),
  status: z.enum(APPROVAL_STATUSES).optional()
}).refine(
  query => (query.startDate === undefined) === (query.endDate === undefined),
  { message: 'startDate and endDate must be given together', path: ['endDate'] }
);

function listQuery(req: Request): ListQuery {
  return validateRequest(req.query, listQuerySchema);
}

/**
 * Timesheet Controller
 * Maps task entry, leave request and approval endpoints onto the timesheet service
 */
export class TimesheetController<Tx> {
  private timesheetService: TimesheetService<Tx>;

  constructor(timesheetService: TimesheetService<Tx>) {
    this.timesheetService = timesheetService;
  }

  // ==========================================================================
  // Task entries
  // ==========================================================================

  /**
   * POST /api/task-entries
   */
  public createTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = validateRequest(req.body, createTaskEntrySchema);
      const entry = await this.timesheetService.createTaskEntry(data, requireActor(req));

      res.status(201).json({ success: true, data: entry });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/task-entries
   */
  public listTaskEntries = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const entries = await this.timesheetService.listTaskEntries(requireActor(req), listQuery(req));
      res.json({ success: true, data: entries, count: entries.length });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/task-entries/:id
   */
  public getTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const entry = await this.timesheetService.getTaskEntry(req.params.id, requireActor(req));
      res.json({ success: true, data: entry });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PATCH /api/task-entries/:id
   */
  public updateTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const changes = validateRequest(req.body, updateTaskEntrySchema);
      const entry = await this.timesheetService.updateTaskEntry(req.params.id, changes, requireActor(req));
      res.json({ success: true, data: entry });
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /api/task-entries/:id
   */
  public deleteTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await this.timesheetService.deleteTaskEntry(req.params.id, requireActor(req));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/task-entries/:id/submit
   */
  public submitTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const entry = await this.timesheetService.submitTaskEntry(req.params.id, requireActor(req));
      res.json({ success: true, message: 'Task entry submitted for approval', data: entry });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/task-entries/:id/revise
   */
  public reviseTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const entry = await this.timesheetService.reviseRejectedTaskEntry(req.params.id, requireActor(req));
      res.status(201).json({ success: true, data: entry });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/task-entries/:id/validation
   */
  public validateTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const check = await this.timesheetService.revalidateTaskEntry(req.params.id, requireActor(req));
      res.json({ success: true, data: check });
    } catch (error) {
      next(error);
    }
  };

  // ==========================================================================
  // Leave requests
  // ==========================================================================

  /**
   * POST /api/leave-requests
   */
  public createLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = validateRequest(req.body, createLeaveRequestSchema);
      const request = await this.timesheetService.createLeaveRequest(data, requireActor(req));
      res.status(201).json({ success: true, data: request });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/leave-requests
   */
  public listLeaveRequests = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const requests = await this.timesheetService.listLeaveRequests(requireActor(req), listQuery(req));
      res.json({ success: true, data: requests, count: requests.length });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/leave-requests/:id
   */
  public getLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const request = await this.timesheetService.getLeaveRequest(req.params.id, requireActor(req));
      res.json({ success: true, data: request });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PATCH /api/leave-requests/:id
   */
  public updateLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const changes = validateRequest(req.body, updateLeaveRequestSchema);
      const request = await this.timesheetService.updateLeaveRequest(req.params.id, changes, requireActor(req));
      res.json({ success: true, data: request });
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /api/leave-requests/:id
   */
  public deleteLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await this.timesheetService.deleteLeaveRequest(req.params.id, requireActor(req));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/leave-requests/:id/submit
   */
  public submitLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const request = await this.timesheetService.submitLeaveRequest(req.params.id, requireActor(req));
      res.json({ success: true, message: 'Leave request submitted for approval', data: request });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/leave-requests/:id/revise
   */
  public reviseLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const request = await this.timesheetService.reviseRejectedLeaveRequest(req.params.id, requireActor(req));
      res.status(201).json({ success: true, data: request });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/leave-requests/:id/validation
   */
  public validateLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const check = await this.timesheetService.revalidateLeaveRequest(req.params.id, requireActor(req));
      res.json({ success: true, data: check });
    } catch (error) {
      next(error);
    }
  };

  // ==========================================================================
  // Approvals (admin)
  // ==========================================================================

  /**
   * GET /api/admin/approvals/task-entries
   */
  public listTaskEntriesForReview = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const entries = await this.timesheetService.listTaskEntriesForReview(requireActor(req), listQuery(req));
      res.json({ success: true, data: entries, count: entries.length });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/admin/approvals/task-entries/:id/approve
   */
  public approveTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { comment } = validateRequest(req.body ?? {}, reviewSchema);
      const entry = await this.timesheetService.approveTaskEntry(req.params.id, requireActor(req), comment);
      res.json({ success: true, message: 'Task entry approved', data: entry });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/admin/approvals/task-entries/:id/reject
   */
  public rejectTaskEntry = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { comment } = validateRequest(req.body ?? {}, reviewSchema);
      const entry = await this.timesheetService.rejectTaskEntry(req.params.id, requireActor(req), comment);
      res.json({ success: true, message: 'Task entry rejected', data: entry });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/admin/approvals/leave-requests
   */
  public listLeaveRequestsForReview = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const requests = await this.timesheetService.listLeaveRequestsForReview(requireActor(req), listQuery(req));
      res.json({ success: true, data: requests, count: requests.length });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/admin/approvals/leave-requests/:id/approve
   */
  public approveLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { comment } = validateRequest(req.body ?? {}, reviewSchema);
      const request = await this.timesheetService.approveLeaveRequest(req.params.id, requireActor(req), comment);
      res.json({ success: true, message: 'Leave request approved', data: request });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/admin/approvals/leave-requests/:id/reject
   */
  public rejectLeaveRequest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { comment } = validateRequest(req.body ?? {}, reviewSchema);
      const request = await this.timesheetService.rejectLeaveRequest(req.params.id, requireActor(req), comment);
      res.json({ success: true, message: 'Leave request rejected', data: request });
    } catch (error) {
      next(error);
    }
  };
}
