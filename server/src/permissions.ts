import { PermissionDeniedError } from './errors';
import type { Store } from './db/store';
import type { Project, Role, User } from './types';

export type VisibilityScope = 'all' | 'membership';

export interface RolePolicy {
  scope: VisibilityScope;
  canManageProjects: boolean;
}

export const ROLE_POLICIES: Record<Role, RolePolicy> = {
  scrum_master: { scope: 'all', canManageProjects: true },
  employee: { scope: 'membership', canManageProjects: false }
};

export function policyFor(user: Pick<User, 'role'>): RolePolicy {
  return ROLE_POLICIES[user.role];
}

/** Store filter restricting listings to what `user` may see. */
export function visibilityFilter(user: Pick<User, 'id' | 'role'>): { memberId?: string } {
  const { scope } = policyFor(user);
  switch (scope) {
    case 'all':
      return {};
    case 'membership':
      return { memberId: user.id };
  }
}

export async function canSeeProject(store: Store, user: Pick<User, 'id' | 'role'>, project: Pick<Project, 'id'>): Promise<boolean> {
  const { scope } = policyFor(user);
  switch (scope) {
    case 'all':
      return true;
    case 'membership':
      return store.isProjectMember(project.id, user.id);
  }
}

export function assertCanManageProjects(user: Pick<User, 'role'>): void {
  if (!policyFor(user).canManageProjects) {
    throw new PermissionDeniedError('Only a Scrum Master can manage projects');
  }
}
