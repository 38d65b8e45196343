import { Actor } from '../User';
import { ApprovalEvent, ApprovalStatus, RuleViolation } from './RuleViolation';

/**
 * Anything that moves through DRAFT -> SUBMITTED -> {APPROVED, REJECTED}.
 */
export interface Approvable<T> {
  readonly id: string;
  readonly ownerId: string;
  readonly status: ApprovalStatus;
  withTransition(patch: TransitionPatch): T;
}

export interface TransitionPatch {
  status: ApprovalStatus;
  updatedAt: Date;
  updatedBy: string;
  reviewedBy?: string;
  reviewedAt?: Date;
  reviewComment?: string;
}

export interface ApprovalDecision {
  outcome: 'APPROVED' | 'REJECTED';
  recordId: string;
  ownerId: string;
  actorId: string;
  timestamp: Date;
  comment?: string;
}

type RequiredActor = 'OWNER' | 'ADMIN';

interface TransitionRule {
  from: ApprovalStatus;
  event: ApprovalEvent;
  to: ApprovalStatus | null; // null removes the record
}

export const TRANSITIONS: readonly TransitionRule[] = [
  { from: 'DRAFT', event: 'update', to: 'DRAFT' },
  { from: 'DRAFT', event: 'submit', to: 'SUBMITTED' },
  { from: 'SUBMITTED', event: 'approve', to: 'APPROVED' },
  { from: 'SUBMITTED', event: 'reject', to: 'REJECTED' },
  { from: 'DRAFT', event: 'delete', to: null }
];

// resubmit is owner-only and has no row above: a rejected record is history
export const EVENT_ACTORS: Record<ApprovalEvent, RequiredActor> = {
  update: 'OWNER',
  submit: 'OWNER',
  approve: 'ADMIN',
  reject: 'ADMIN',
  delete: 'OWNER',
  resubmit: 'OWNER'
};

export type TransitionResult<T> =
  | { accepted: true; record: T; removed: boolean; from: ApprovalStatus; decision?: ApprovalDecision }
  | { accepted: false; violations: RuleViolation[] };

export interface ApprovalStateMachineOptions {
  requireRejectionComment?: boolean;
}

export class ApprovalStateMachine<T extends Approvable<T>> {
  private readonly requireRejectionComment: boolean;

  constructor(options: ApprovalStateMachineOptions = {}) {
    this.requireRejectionComment = options.requireRejectionComment ?? false;
  }

  /**
   * Role and ownership are checked before the state, so an unauthorized
   * actor never learns whether the transition would have been valid.
   */
  public authorize(record: T, event: ApprovalEvent, actor: Actor): RuleViolation | undefined {
    const required = EVENT_ACTORS[event];

    if (required === 'ADMIN' && actor.role !== 'ADMIN') {
      return { code: 'FORBIDDEN', actorId: actor.id, event, reason: 'ROLE' };
    }

    if (required === 'OWNER' && actor.id !== record.ownerId) {
      return { code: 'FORBIDDEN', actorId: actor.id, event, reason: 'OWNERSHIP' };
    }

    return undefined;
  }

  public findRule(from: ApprovalStatus, event: ApprovalEvent): TransitionRule | undefined {
    return TRANSITIONS.find(rule => rule.from === from && rule.event === event);
  }

  public can(record: T, event: ApprovalEvent, actor: Actor): boolean {
    return !this.authorize(record, event, actor) && this.findRule(record.status, event) !== undefined;
  }

  public transition(
    record: T,
    event: ApprovalEvent,
    actor: Actor,
    at: Date,
    comment?: string
  ): TransitionResult<T> {
    const forbidden = this.authorize(record, event, actor);
    if (forbidden) {
      return { accepted: false, violations: [forbidden] };
    }

    const rule = this.findRule(record.status, event);
    if (!rule) {
      return {
        accepted: false,
        violations: [{ code: 'INVALID_TRANSITION', recordId: record.id, from: record.status, event }]
      };
    }

    if (rule.to === null) {
      return { accepted: true, record, removed: true, from: record.status };
    }

    const trimmedComment = comment?.trim() || undefined;

    if (rule.to === 'APPROVED' || rule.to === 'REJECTED') {
      if (rule.to === 'REJECTED' && this.requireRejectionComment && !trimmedComment) {
        return {
          accepted: false,
          violations: [{ code: 'REVIEW_COMMENT_REQUIRED', recordId: record.id, event }]
        };
      }

      const next = record.withTransition({
        status: rule.to,
        updatedAt: at,
        updatedBy: actor.id,
        reviewedBy: actor.id,
        reviewedAt: at,
        reviewComment: trimmedComment
      });

      return {
        accepted: true,
        record: next,
        removed: false,
        from: record.status,
        decision: {
          outcome: rule.to,
          recordId: record.id,
          ownerId: record.ownerId,
          actorId: actor.id,
          timestamp: at,
          comment: trimmedComment
        }
      };
    }

    const next = record.withTransition({
      status: rule.to,
      updatedAt: at,
      updatedBy: actor.id
    });

    return { accepted: true, record: next, removed: false, from: record.status };
  }
}
