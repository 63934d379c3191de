import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { UsersService } from './users.service';

const MIN_SEED_PASSWORD_LENGTH = 10;

/**
 * Creates the first admin account from SEED_ADMIN_EMAIL / SEED_ADMIN_PASSWORD
 * when the users table is empty.
 */
@Injectable()
export class UsersSeedService implements OnApplicationBootstrap {
    private readonly logger = new Logger(UsersSeedService.name);

    constructor(
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        private readonly usersService: UsersService,
    ) {}

    async onApplicationBootstrap() {
        await this.seedAdmin();
    }

    async seedAdmin(): Promise<boolean> {
        const { adminEmail, adminPassword, adminName } = this.config.seed;

        if (!adminEmail || !adminPassword) {
            return false;
        }

        if (adminPassword.length < MIN_SEED_PASSWORD_LENGTH) {
            this.logger.warn(
                `SEED_ADMIN_PASSWORD must be at least ${MIN_SEED_PASSWORD_LENGTH} characters; skipping admin seed`,
            );
            return false;
        }

        const existing = await this.usersService.count();
        if (existing > 0) {
            return false;
        }

        const admin = await this.usersService.create({
            email: adminEmail,
            name: adminName,
            password: adminPassword,
            role: 'admin',
        });

        this.logger.log(`Seeded initial admin account ${admin.email}`);
        return true;
    }
}
