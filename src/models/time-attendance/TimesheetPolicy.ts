import Joi from 'joi';
import { validateAndThrow } from '../../utils/validation';
import { isValidTimeZone } from './TimeAccounting';

export interface TimesheetPolicy {
  dailyHourLimit: number;
  hourGranularity?: number; // e.g. 0.25 for quarter hours
  requireRejectionComment: boolean;
  defaultTimeZone: string;
}

export const DEFAULT_TIMESHEET_POLICY: TimesheetPolicy = {
  dailyHourLimit: 8,
  requireRejectionComment: false,
  defaultTimeZone: 'UTC'
};

const timeZoneSchema = Joi.string().custom((value: string, helpers) => {
  if (!isValidTimeZone(value)) {
    return helpers.error('any.invalid');
  }
  return value;
}, 'IANA time zone');

const policySchema = Joi.object<TimesheetPolicy>({
  dailyHourLimit: Joi.number().greater(0).max(24).precision(2).required(),
  hourGranularity: Joi.number().greater(0).max(8).precision(2).optional(),
  requireRejectionComment: Joi.boolean().required(),
  defaultTimeZone: timeZoneSchema.required()
});

export function createTimesheetPolicy(overrides: Partial<TimesheetPolicy> = {}): TimesheetPolicy {
  return validateAndThrow(policySchema, { ...DEFAULT_TIMESHEET_POLICY, ...overrides });
}

interface TimesheetPolicyEnv {
  TIMESHEET_DAILY_HOUR_LIMIT: number;
  TIMESHEET_HOUR_GRANULARITY?: number;
  TIMESHEET_REQUIRE_REJECTION_COMMENT: boolean;
  TIMESHEET_DEFAULT_TIME_ZONE: string;
}

const envSchema = Joi.object<TimesheetPolicyEnv>({
  TIMESHEET_DAILY_HOUR_LIMIT: Joi.number().default(DEFAULT_TIMESHEET_POLICY.dailyHourLimit),
  TIMESHEET_HOUR_GRANULARITY: Joi.number().optional(),
  TIMESHEET_REQUIRE_REJECTION_COMMENT: Joi.boolean().default(DEFAULT_TIMESHEET_POLICY.requireRejectionComment),
  TIMESHEET_DEFAULT_TIME_ZONE: Joi.string().default(DEFAULT_TIMESHEET_POLICY.defaultTimeZone)
}).unknown(true);

/**
 * Reads the timesheet policy from environment variables, falling back to
 * the defaults for anything unset.
 */
export function loadTimesheetPolicy(env: NodeJS.ProcessEnv = process.env): TimesheetPolicy {
  const settings = validateAndThrow(envSchema, env);

  return createTimesheetPolicy({
    dailyHourLimit: settings.TIMESHEET_DAILY_HOUR_LIMIT,
    hourGranularity: settings.TIMESHEET_HOUR_GRANULARITY,
    requireRejectionComment: settings.TIMESHEET_REQUIRE_REJECTION_COMMENT,
    defaultTimeZone: settings.TIMESHEET_DEFAULT_TIME_ZONE
  });
}
