import { Router } from 'express';
import { TimesheetController } from '../../controllers/time-attendance/TimesheetController';
import { IdentityProvider, authenticate, requireRole } from '../../middleware/authenticate';

/**
 * Timesheet endpoints, mounted under /api
 */
export function createTimesheetRoutes<Tx>(
  controller: TimesheetController<Tx>,
  identityProvider: IdentityProvider
): Router {
  const router = Router();

  router.use(authenticate(identityProvider));

  /**
   * Task entries
   */

  // GET /api/task-entries - List the caller's task entries (preset or startDate/endDate)
  router.get('/task-entries', controller.listTaskEntries);

  // POST /api/task-entries - Create a draft task entry
  router.post('/task-entries', controller.createTaskEntry);

  router.get('/task-entries/:id', controller.getTaskEntry);
  router.patch('/task-entries/:id', controller.updateTaskEntry);
  router.delete('/task-entries/:id', controller.deleteTaskEntry);

  // POST /api/task-entries/:id/submit - Submit a draft for approval
  router.post('/task-entries/:id/submit', controller.submitTaskEntry);

  // POST /api/task-entries/:id/revise - Copy a rejected entry into a new draft
  router.post('/task-entries/:id/revise', controller.reviseTaskEntry);

  router.get('/task-entries/:id/validation', controller.validateTaskEntry);

  /**
   * Leave requests
   */

  router.get('/leave-requests', controller.listLeaveRequests);
  router.post('/leave-requests', controller.createLeaveRequest);
  router.get('/leave-requests/:id', controller.getLeaveRequest);
  router.patch('/leave-requests/:id', controller.updateLeaveRequest);
  router.delete('/leave-requests/:id', controller.deleteLeaveRequest);
  router.post('/leave-requests/:id/submit', controller.submitLeaveRequest);
  router.post('/leave-requests/:id/revise', controller.reviseLeaveRequest);
  router.get('/leave-requests/:id/validation', controller.validateLeaveRequest);

  /**
   * Approvals (admin only)
   */

  router.get('/admin/approvals/task-entries', requireRole('ADMIN'), controller.listTaskEntriesForReview);
  router.post('/admin/approvals/task-entries/:id/approve', requireRole('ADMIN'), controller.approveTaskEntry);
  router.post('/admin/approvals/task-entries/:id/reject', requireRole('ADMIN'), controller.rejectTaskEntry);

  router.get('/admin/approvals/leave-requests', requireRole('ADMIN'), controller.listLeaveRequestsForReview);
  router.post('/admin/approvals/leave-requests/:id/approve', requireRole('ADMIN'), controller.approveLeaveRequest);
  router.post('/admin/approvals/leave-requests/:id/reject', requireRole('ADMIN'), controller.rejectLeaveRequest);

  return router;
}
