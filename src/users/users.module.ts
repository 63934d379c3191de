import { Module } from '@nestjs/common';
import { DrizzleUsersRepository } from './drizzle-users.repository';
import { UsersSeedService } from './users-seed.service';
import { UsersController } from './users.controller';
import { UsersRepository } from './users.repository';
import { UsersService } from './users.service';

@Module({
    controllers: [UsersController],
    providers: [
        { provide: UsersRepository, useClass: DrizzleUsersRepository },
        UsersService,
        UsersSeedService,
    ],
    exports: [UsersService],
})
export class UsersModule {}
