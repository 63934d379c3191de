import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import type { SessionUser } from '../interfaces/session-user.interface';
import { SessionRedirectException } from '../exceptions/session-redirect.exception';

export const CurrentUser = createParamDecorator(
    (_data: unknown, context: ExecutionContext): SessionUser => {
        const request = context.switchToHttp().getRequest<Request>();

        if (!request.user) {
            throw new SessionRedirectException('no_token');
        }

        return request.user;
    },
);
