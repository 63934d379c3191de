import { Transform } from 'class-transformer';
import { IsEmail, IsIn, IsString, MaxLength, MinLength } from 'class-validator';
import { USER_ROLES, UserRole } from '../../drizzle/schema';

export class CreateUserDto {
    @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
    @IsEmail({}, { message: 'Invalid email address' })
    @MaxLength(255)
    email: string;

    @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
    @IsString()
    @MinLength(1, { message: 'Name is required' })
    @MaxLength(255)
    name: string;

    @IsString()
    @MinLength(10, { message: 'Password must be at least 10 characters' })
    @MaxLength(72, { message: 'Password must be at most 72 characters' })
    password: string;

    @IsIn(USER_ROLES, { message: `Role must be one of: ${USER_ROLES.join(', ')}` })
    role: UserRole;
}
