import {
    Body,
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Param,
    ParseIntPipe,
    Post,
    UseGuards,
} from '@nestjs/common';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { Roles } from '../auth/decorators/roles.decorator';
import { RolesGuard } from '../auth/guards/roles.guard';
import { SessionAuthGuard } from '../auth/guards/session-auth.guard';
import type { SessionUser } from '../auth/interfaces/session-user.interface';
import { CreateUserDto } from './dto/create-user.dto';
import { UsersService } from './users.service';

@Controller()
@UseGuards(SessionAuthGuard, RolesGuard)
@Roles('admin')
export class UsersController {
    constructor(private readonly usersService: UsersService) {}

    @Get('admin/users')
    async findAll() {
        const users = await this.usersService.findAll();
        return { data: users };
    }

    @Post('api/users')
    @HttpCode(HttpStatus.CREATED)
    async create(@Body() createUserDto: CreateUserDto) {
        const user = await this.usersService.create(createUserDto);
        return { ok: true, user };
    }

    @Post('api/users/:id/toggle')
    @HttpCode(HttpStatus.OK)
    async toggle(@Param('id', ParseIntPipe) id: number, @CurrentUser() user: SessionUser) {
        const updated = await this.usersService.toggleActive(id, user.userId);
        return { ok: true, isActive: updated.isActive };
    }

    @Post('api/users/:id/delete')
    @HttpCode(HttpStatus.OK)
    async remove(@Param('id', ParseIntPipe) id: number, @CurrentUser() user: SessionUser) {
        await this.usersService.remove(id, user.userId);
        return { ok: true };
    }
}
