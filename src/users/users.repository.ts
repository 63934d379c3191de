import type { User, UserRole } from '../drizzle/schema';

export interface NewUserInput {
    email: string;
    name: string;
    passwordHash: string;
    role: UserRole;
}

export abstract class UsersRepository {
    abstract count(): Promise<number>;

    /** Newest first */
    abstract findAll(): Promise<User[]>;

    abstract findById(id: number): Promise<User | undefined>;

    abstract findByEmail(email: string): Promise<User | undefined>;

    abstract create(input: NewUserInput): Promise<User>;

    abstract setActive(id: number, isActive: boolean): Promise<User | undefined>;

    abstract remove(id: number): Promise<boolean>;
}
