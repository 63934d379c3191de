import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Inject, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { SessionRedirectException } from '../exceptions/session-redirect.exception';

@Catch(SessionRedirectException)
export class SessionRedirectFilter implements ExceptionFilter {
    private readonly logger = new Logger(SessionRedirectFilter.name);

    constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

    catch(exception: SessionRedirectException, host: ArgumentsHost) {
        const response = host.switchToHttp().getResponse<Response>();

        this.logger.debug(`Session rejected: ${exception.reason}`);

        // No protected content: clear the cookie and send the client to login
        response.clearCookie(this.config.auth.cookieName, { path: '/' });
        response.redirect(HttpStatus.FOUND, `/admin/login?error=${exception.reason}`);
    }
}
