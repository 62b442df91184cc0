export type PrincipalRole = 'admin' | 'user';

/**
 * Identity on whose behalf operations run and jobs are owned
 */
export interface Principal {
  id: string;
  role: PrincipalRole;
}

export function isAdmin(principal: Principal): boolean {
  return principal.role === 'admin';
}
