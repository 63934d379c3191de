import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import type { UserRole } from '../../drizzle/schema';
import { accessDeniedMessage, isRoleAllowed } from '../access-policy';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { SessionRedirectException } from '../exceptions/session-redirect.exception';
import type { SessionUser } from '../interfaces/session-user.interface';

/**
 * Role gate; runs after SessionAuthGuard. Routes without @Roles() are open
 * to every authenticated role.
 */
@Injectable()
export class RolesGuard implements CanActivate {
    constructor(private readonly reflector: Reflector) {}

    canActivate(context: ExecutionContext): boolean {
        const required = this.reflector.getAllAndOverride<UserRole[] | undefined>(ROLES_KEY, [
            context.getHandler(),
            context.getClass(),
        ]);

        if (!required || required.length === 0) {
            return true;
        }

        const request = context.switchToHttp().getRequest<Request>();
        const user: SessionUser | undefined = request.user;

        if (!user) {
            throw new SessionRedirectException('no_token');
        }

        if (!isRoleAllowed(user.role, required)) {
            throw new ForbiddenException(accessDeniedMessage(required));
        }

        return true;
    }
}
