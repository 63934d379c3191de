import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import type { User } from '../drizzle/schema';
import { PublicUser, toPublicUser, UsersService } from '../users/users.service';
import { LoginDto } from './dto/login.dto';
import type { JwtPayload } from './strategies/jwt.strategy';

export interface AuthResponse {
    accessToken: string;
    user: PublicUser;
}

@Injectable()
export class AuthService {
    private readonly logger = new Logger(AuthService.name);

    constructor(
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        private usersService: UsersService,
        private jwtService: JwtService,
    ) {}

    async login(loginDto: LoginDto): Promise<AuthResponse> {
        const user = await this.validateUser(loginDto.email, loginDto.password);

        if (!user) {
            throw new UnauthorizedException('Invalid email or password');
        }

        const accessToken = this.generateAccessToken(user);
        this.logger.log(`User ${user.id} logged in`);

        return { accessToken, user: toPublicUser(user) };
    }

    /**
     * Returns the user only when it exists, is active and the password matches
     */
    async validateUser(email: string, password: string): Promise<User | null> {
        const user = await this.usersService.findByEmail(email);

        if (!user || !user.isActive) {
            return null;
        }

        const isPasswordValid = await bcrypt.compare(password, user.passwordHash);

        if (!isPasswordValid) {
            return null;
        }

        return user;
    }

    generateAccessToken(user: Pick<User, 'id' | 'role'>): string {
        const payload: JwtPayload = { sub: String(user.id), role: user.role };

        return this.jwtService.sign(payload, {
            secret: this.config.auth.secretKey,
            expiresIn: `${this.config.auth.tokenTtlMinutes}m`,
            algorithm: 'HS256',
        });
    }

    get tokenTtlMs(): number {
        return this.config.auth.tokenTtlMinutes * 60 * 1000;
    }
}
