export const ROLES = ['monitor', 'dispatcher', 'autoscaler', 'standalone'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export function runsMonitor(role: Role): boolean {
  return role === 'monitor' || role === 'standalone';
}

export function runsDispatcher(role: Role): boolean {
  return role === 'dispatcher' || role === 'standalone';
}

export function runsAutoscaler(role: Role): boolean {
  return role === 'autoscaler' || role === 'standalone';
}
