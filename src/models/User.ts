export const USER_ROLES = ['ADMIN', 'EMPLOYEE'] as const;

export type UserRole = typeof USER_ROLES[number];

/**
 * The acting user of a single call, as resolved by the identity provider.
 */
export interface Actor {
  id: string;
  role: UserRole;
}

export function isAdmin(actor: Actor): boolean {
  return actor.role === 'ADMIN';
}
