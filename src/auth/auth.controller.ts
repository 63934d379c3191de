import {
    Body,
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Inject,
    Post,
    Query,
    Res,
    UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { AuthService } from './auth.service';
import { CurrentUser } from './decorators/current-user.decorator';
import { LoginDto } from './dto/login.dto';
import {
    isSessionFailureReason,
    SESSION_FAILURE_MESSAGES,
} from './exceptions/session-redirect.exception';
import { SessionAuthGuard } from './guards/session-auth.guard';
import type { SessionUser } from './interfaces/session-user.interface';

@Controller('admin')
export class AuthController {
    constructor(
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        private readonly authService: AuthService,
    ) {}

    @Post('login')
    @HttpCode(HttpStatus.OK)
    async login(
        @Body() loginDto: LoginDto,
        @Res({ passthrough: true }) response: Response,
    ) {
        const { accessToken, user } = await this.authService.login(loginDto);

        response.cookie(this.config.auth.cookieName, accessToken, {
            httpOnly: true,
            secure: this.config.isProduction,
            sameSite: 'lax',
            path: '/',
            maxAge: this.authService.tokenTtlMs,
        });

        return { ok: true, user };
    }

    // Where session failures land; reports the reason in readable form
    @Get('login')
    loginStatus(@Query('error') error?: string) {
        if (!isSessionFailureReason(error)) {
            return { error: null, message: null };
        }

        return { error, message: SESSION_FAILURE_MESSAGES[error] };
    }

    @Get('logout')
    logout(@Res() response: Response) {
        response.clearCookie(this.config.auth.cookieName, { path: '/' });
        response.redirect(HttpStatus.FOUND, '/admin/login');
    }

    @Get('me')
    @UseGuards(SessionAuthGuard)
    me(@CurrentUser() user: SessionUser) {
        return { user };
    }
}
