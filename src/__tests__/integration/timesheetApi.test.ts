import request from 'supertest';
import { createApp } from '../../app';
import { TimesheetService } from '../../services/time-attendance/TimesheetService';
import { JwtIdentityProvider } from '../../middleware/authenticate';
import { Actor } from '../../models/User';
import { fixedClock } from '../../utils/clock';
import { InMemoryTx, createInMemoryPersistence } from '../support/inMemoryStores';

jest.mock('../../utils/logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    http: jest.fn(),
    debug: jest.fn()
  }
}));

const owner: Actor = { id: 'user-1', role: 'EMPLOYEE' };
const admin: Actor = { id: 'admin-1', role: 'ADMIN' };

function createTestApp(healthCheck?: () => Promise<{ connected: boolean }>) {
  const identityProvider = new JwtIdentityProvider({ secret: 'test-secret' });
  const timesheetService = new TimesheetService<InMemoryTx>({
    ...createInMemoryPersistence(['client-a', 'client-b']),
    clock: fixedClock(new Date('2026-02-11T12:00:00Z'))
  });
  const app = createApp({ timesheetService, identityProvider, healthCheck });

  return {
    app,
    ownerToken: `Bearer ${identityProvider.sign(owner)}`,
    adminToken: `Bearer ${identityProvider.sign(admin)}`
  };
}

const sevenHours = {
  workDate: '2026-02-10',
  subTasks: [
    { clientId: 'client-a', description: 'Support', hours: 3 },
    { clientId: 'client-b', description: 'Review', hours: 4 }
  ]
};

describe('Timesheet API', () => {
  describe('authentication', () => {
    it('should require a bearer token', async () => {
      const { app } = createTestApp();

      const response = await request(app).get('/api/task-entries');

      expect(response.status).toBe(401);
      expect(response.body.error).toMatchObject({
        code: 'AUTHENTICATION_ERROR',
        message: 'Authentication token is required'
      });
    });

    it('should reject a malformed token', async () => {
      const { app } = createTestApp();

      const response = await request(app).get('/api/task-entries').set('Authorization', 'Bearer not-a-token');

      expect(response.status).toBe(401);
      expect(response.body.error.message).toBe('Invalid authentication token');
    });

    it('should keep employees out of the approval queue', async () => {
      const { app, ownerToken } = createTestApp();

      const response = await request(app).get('/api/admin/approvals/task-entries').set('Authorization', ownerToken);

      expect(response.status).toBe(403);
      expect(response.body.error.code).toBe('AUTHORIZATION_ERROR');
    });
  });

  describe('task entries', () => {
    it('should create a draft entry', async () => {
      const { app, ownerToken } = createTestApp();

      const response = await request(app).post('/api/task-entries').set('Authorization', ownerToken).send(sevenHours);

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({
        ownerId: 'user-1',
        workDate: '2026-02-10',
        status: 'DRAFT',
        totalHours: 7,
        version: 0,
        createdAt: '2026-02-11T12:00:00.000Z'
      });
    });

    it('should explain a breach of the daily limit', async () => {
      const { app, ownerToken } = createTestApp();
      const created = await request(app).post('/api/task-entries').set('Authorization', ownerToken).send(sevenHours);

      const response = await request(app)
        .patch(`/api/task-entries/${created.body.data.id}`)
        .set('Authorization', ownerToken)
        .set('x-request-id', 'req-daily-limit')
        .send({ subTasks: [...sevenHours.subTasks, { clientId: 'client-a', description: 'Extra', hours: 2 }] });

      expect(response.status).toBe(409);
      expect(response.body.error).toMatchObject({
        code: 'DAILY_HOURS_EXCEEDED',
        message: 'cannot log 9.0 hours on 2026-02-10: daily limit is 8.0',
        details: {
          violations: [{ code: 'DAILY_HOURS_EXCEEDED', date: '2026-02-10', attempted: 9, limit: 8 }]
        },
        requestId: 'req-daily-limit'
      });
    });

    it('should explain an oversized sub-task with the daily limit', async () => {
      const { app, ownerToken } = createTestApp();

      const response = await request(app)
        .post('/api/task-entries')
        .set('Authorization', ownerToken)
        .send({ workDate: '2026-02-10', subTasks: [{ clientId: 'client-a', description: 'Migration', hours: 25 }] });

      expect(response.status).toBe(409);
      expect(response.body.error).toMatchObject({
        code: 'DAILY_HOURS_EXCEEDED',
        message: 'cannot log 25.0 hours on 2026-02-10: daily limit is 8.0'
      });
    });

    it('should validate the request body', async () => {
      const { app, ownerToken } = createTestApp();

      const response = await request(app)
        .post('/api/task-entries')
        .set('Authorization', ownerToken)
        .send({ workDate: '10/02/2026', subTasks: [] });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details.fields).toEqual([
        { field: 'workDate', message: 'Expected a date in YYYY-MM-DD format' }
      ]);
    });

    it('should reject malformed JSON', async () => {
      const { app, ownerToken } = createTestApp();

      const response = await request(app)
        .post('/api/task-entries')
        .set('Authorization', ownerToken)
        .set('Content-Type', 'application/json')
        .send('{"workDate":');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('INVALID_JSON');
    });

    it('should run an entry through submission and a single approval', async () => {
      const { app, ownerToken, adminToken } = createTestApp();
      const created = await request(app).post('/api/task-entries').set('Authorization', ownerToken).send(sevenHours);
      const id: string = created.body.data.id;

      const submitted = await request(app).post(`/api/task-entries/${id}/submit`).set('Authorization', ownerToken);
      expect(submitted.status).toBe(200);
      expect(submitted.body.message).toBe('Task entry submitted for approval');

      const queue = await request(app).get('/api/admin/approvals/task-entries').set('Authorization', adminToken);
      expect(queue.body.count).toBe(1);

      const approved = await request(app)
        .post(`/api/admin/approvals/task-entries/${id}/approve`)
        .set('Authorization', adminToken)
        .send({ comment: 'Thanks' });
      expect(approved.status).toBe(200);
      expect(approved.body.data).toMatchObject({ status: 'APPROVED', reviewedBy: 'admin-1', reviewComment: 'Thanks', version: 2 });

      const again = await request(app).post(`/api/admin/approvals/task-entries/${id}/approve`).set('Authorization', adminToken);
      expect(again.status).toBe(409);
      expect(again.body.error.code).toBe('INVALID_TRANSITION');
      expect(again.body.error.message).toBe(`cannot approve record ${id} while it is APPROVED`);
    });

    it('should hide another employee entry', async () => {
      const { app, ownerToken } = createTestApp();
      const colleagueToken = `Bearer ${new JwtIdentityProvider({ secret: 'test-secret' }).sign({ id: 'user-2', role: 'EMPLOYEE' })}`;
      const created = await request(app).post('/api/task-entries').set('Authorization', ownerToken).send(sevenHours);

      const response = await request(app).get(`/api/task-entries/${created.body.data.id}`).set('Authorization', colleagueToken);

      expect(response.status).toBe(404);
      expect(response.body.error.message).toBe('Task entry not found');
    });

    it('should report validation state and delete drafts', async () => {
      const { app, ownerToken } = createTestApp();
      const created = await request(app).post('/api/task-entries').set('Authorization', ownerToken).send(sevenHours);
      const id: string = created.body.data.id;

      const validation = await request(app).get(`/api/task-entries/${id}/validation`).set('Authorization', ownerToken);
      expect(validation.body.data).toEqual({ isValid: true, violations: [] });

      const deleted = await request(app).delete(`/api/task-entries/${id}`).set('Authorization', ownerToken);
      expect(deleted.status).toBe(204);

      const listed = await request(app).get('/api/task-entries').set('Authorization', ownerToken);
      expect(listed.body).toEqual({ success: true, data: [], count: 0 });
    });
  });

  describe('leave requests', () => {
    it('should reject overlapping leave with the conflicting request', async () => {
      const { app, ownerToken } = createTestApp();
      const first = await request(app)
        .post('/api/leave-requests')
        .set('Authorization', ownerToken)
        .send({ startDate: '2026-03-01', endDate: '2026-03-05', reason: 'Holiday' });
      expect(first.status).toBe(201);
      expect(first.body.data).toMatchObject({ leaveType: 'FULL_DAY', totalDays: 5, hoursPerDay: 8 });

      const response = await request(app)
        .post('/api/leave-requests')
        .set('Authorization', ownerToken)
        .send({ startDate: '2026-03-04', endDate: '2026-03-06', reason: 'Trip' });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe('LEAVE_OVERLAP');
      expect(response.body.error.details.violations).toEqual([
        { code: 'LEAVE_OVERLAP', conflictingId: first.body.data.id, startDate: '2026-03-01', endDate: '2026-03-05' }
      ]);
    });

    it('should require both ends of a listing range', async () => {
      const { app, ownerToken } = createTestApp();

      const response = await request(app).get('/api/leave-requests?startDate=2026-03-01').set('Authorization', ownerToken);

      expect(response.status).toBe(400);
      expect(response.body.error.details.fields).toEqual([
        { field: 'endDate', message: 'startDate and endDate must be given together' }
      ]);
    });
  });

  describe('infrastructure routes', () => {
    it('should report health from the database check', async () => {
      const healthy = await request(createTestApp().app).get('/health');
      const degraded = await request(createTestApp(async () => ({ connected: false })).app).get('/health');

      expect(healthy.status).toBe(200);
      expect(healthy.body.status).toBe('healthy');
      expect(degraded.status).toBe(503);
      expect(degraded.body.status).toBe('degraded');
    });

    it('should answer unknown routes with 404', async () => {
      const response = await request(createTestApp().app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body.error.message).toBe('Route GET /nope not found');
    });
  });
});
