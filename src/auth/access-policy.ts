import type { UserRole } from '../drizzle/schema';

// Roles allowed to run destructive actions and manage accounts
export const ADMIN_ONLY: readonly UserRole[] = ['admin'];

export function isRoleAllowed(role: UserRole, allowed: readonly UserRole[]): boolean {
    return allowed.includes(role);
}

export function accessDeniedMessage(allowed: readonly UserRole[]): string {
    return `Access denied. Required role: ${allowed.join(', ')}`;
}
