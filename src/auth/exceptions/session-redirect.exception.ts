import { HttpException, HttpStatus } from '@nestjs/common';

export const SESSION_FAILURE_REASONS = [
    'no_token',
    'invalid_token',
    'token_expired',
    'user_inactive',
] as const;
export type SessionFailureReason = (typeof SESSION_FAILURE_REASONS)[number];

export const SESSION_FAILURE_MESSAGES: Record<SessionFailureReason, string> = {
    no_token: 'Please log in to continue',
    invalid_token: 'Invalid session. Please log in again',
    token_expired: 'Your session has expired. Please log in again',
    user_inactive: 'Your account has been deactivated. Contact administrator',
};

export function isSessionFailureReason(value: unknown): value is SessionFailureReason {
    return SESSION_FAILURE_REASONS.some((reason) => reason === value);
}

/**
 * Raised when a protected route is reached without a usable session.
 * SessionRedirectFilter turns it into a redirect to the login page.
 */
export class SessionRedirectException extends HttpException {
    constructor(readonly reason: SessionFailureReason) {
        super(SESSION_FAILURE_MESSAGES[reason], HttpStatus.UNAUTHORIZED);
    }
}
