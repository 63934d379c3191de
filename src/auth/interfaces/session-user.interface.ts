/// <reference types="passport" />
import type { UserRole } from '../../drizzle/schema';

/**
 * The authenticated dashboard user attached to the request by JwtStrategy
 */
export interface SessionUser {
    userId: number;
    email: string;
    name: string;
    role: UserRole;
}

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        // eslint-disable-next-line @typescript-eslint/no-empty-interface
        interface User extends SessionUser {}
    }
}
