import {
    BadRequestException,
    ConflictException,
    Inject,
    Injectable,
    Logger,
    NotFoundException,
} from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import type { User } from '../drizzle/schema';
import { retryIdempotent } from '../drizzle/db-utils';
import { CreateUserDto } from './dto/create-user.dto';
import { UsersRepository } from './users.repository';

// Public user type that excludes the password hash
export type PublicUser = Omit<User, 'passwordHash'>;

export function toPublicUser(user: User): PublicUser {
    const { passwordHash: _passwordHash, ...publicUser } = user;
    return publicUser;
}

function isUniqueViolation(error: unknown): boolean {
    return error instanceof Error && Reflect.get(error, 'code') === '23505';
}

@Injectable()
export class UsersService {
    private readonly logger = new Logger(UsersService.name);

    constructor(
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        private readonly usersRepository: UsersRepository,
    ) {}

    async count(): Promise<number> {
        return this.usersRepository.count();
    }

    async findAll(): Promise<PublicUser[]> {
        const allUsers = await this.usersRepository.findAll();
        return allUsers.map(toPublicUser);
    }

    async findByEmail(email: string): Promise<User | undefined> {
        return this.usersRepository.findByEmail(email.trim().toLowerCase());
    }

    async findActiveById(id: number): Promise<User | undefined> {
        const user = await retryIdempotent(`Load user ${id}`, () => this.usersRepository.findById(id));
        return user?.isActive ? user : undefined;
    }

    async create(createUserDto: CreateUserDto): Promise<PublicUser> {
        const email = createUserDto.email.trim().toLowerCase();
        const existingUser = await this.usersRepository.findByEmail(email);

        if (existingUser) {
            throw new ConflictException('User with this email already exists');
        }

        const passwordHash = await bcrypt.hash(createUserDto.password, this.config.auth.bcryptRounds);

        try {
            const newUser = await this.usersRepository.create({
                email,
                name: createUserDto.name.trim(),
                passwordHash,
                role: createUserDto.role,
            });

            this.logger.log(`Created ${newUser.role} user ${newUser.id}`);
            return toPublicUser(newUser);
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new ConflictException('User with this email already exists');
            }
            throw error;
        }
    }

    async toggleActive(id: number, actingUserId: number): Promise<PublicUser> {
        if (id === actingUserId) {
            throw new BadRequestException('You cannot deactivate your own account');
        }

        const user = await this.usersRepository.findById(id);
        if (!user) {
            throw new NotFoundException(`User with ID ${id} not found`);
        }

        const updated = await this.usersRepository.setActive(id, !user.isActive);
        if (!updated) {
            throw new NotFoundException(`User with ID ${id} not found`);
        }

        this.logger.log(`User ${id} ${updated.isActive ? 'activated' : 'deactivated'} by user ${actingUserId}`);
        return toPublicUser(updated);
    }

    async remove(id: number, actingUserId: number): Promise<void> {
        if (id === actingUserId) {
            throw new BadRequestException('You cannot delete your own account');
        }

        const deleted = await this.usersRepository.remove(id);
        if (!deleted) {
            throw new NotFoundException(`User with ID ${id} not found`);
        }

        this.logger.log(`User ${id} deleted by user ${actingUserId}`);
    }
}
