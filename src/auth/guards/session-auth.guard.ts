import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
    SessionFailureReason,
    SessionRedirectException,
} from '../exceptions/session-redirect.exception';

/**
 * Maps the passport-jwt failure info to a session failure reason
 */
export function sessionFailureReason(info: unknown): SessionFailureReason {
    if (info instanceof Error) {
        if (info.name === 'TokenExpiredError') {
            return 'token_expired';
        }
        if (info.message === 'No auth token') {
            return 'no_token';
        }
    }

    return 'invalid_token';
}

@Injectable()
export class SessionAuthGuard extends AuthGuard('jwt') {
    handleRequest<TUser>(err: unknown, user: TUser | false | null, info: unknown): TUser {
        if (err) {
            throw err;
        }

        if (!user) {
            throw new SessionRedirectException(sessionFailureReason(info));
        }

        return user;
    }
}
