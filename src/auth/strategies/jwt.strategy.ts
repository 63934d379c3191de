import { Inject, Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import type { UserRole } from '../../drizzle/schema';
import { UsersService } from '../../users/users.service';
import { SessionRedirectException } from '../exceptions/session-redirect.exception';
import type { SessionUser } from '../interfaces/session-user.interface';

export interface JwtPayload {
    sub?: unknown;
    role?: UserRole;
}

export function cookieExtractor(cookieName: string) {
    return (request: { cookies?: unknown }): string | null => {
        const cookies: unknown = request.cookies;
        if (typeof cookies !== 'object' || cookies === null) {
            return null;
        }

        const token: unknown = Reflect.get(cookies, cookieName);
        return typeof token === 'string' && token.length > 0 ? token : null;
    };
}

/**
 * Parses the `sub` claim into a user id; null when it is not a positive integer
 */
export function parseSubject(sub: unknown): number | null {
    const raw = typeof sub === 'number' ? String(sub) : sub;
    if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
        return null;
    }

    const id = parseInt(raw, 10);
    return Number.isSafeInteger(id) && id > 0 ? id : null;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
    constructor(
        @Inject(APP_CONFIG) config: AppConfig,
        private usersService: UsersService,
    ) {
        super({
            jwtFromRequest: ExtractJwt.fromExtractors([cookieExtractor(config.auth.cookieName)]),
            ignoreExpiration: false,
            secretOrKey: config.auth.secretKey,
            algorithms: ['HS256'],
        });
    }

    async validate(payload: JwtPayload): Promise<SessionUser> {
        const userId = parseSubject(payload.sub);

        if (userId === null) {
            throw new SessionRedirectException('invalid_token');
        }

        // Role and active flag come from the database, not the token
        const user = await this.usersService.findActiveById(userId);

        if (!user) {
            throw new SessionRedirectException('user_inactive');
        }

        return { userId: user.id, email: user.email, name: user.name, role: user.role };
    }
}
