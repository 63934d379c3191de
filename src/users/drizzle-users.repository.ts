import { Inject, Injectable } from '@nestjs/common';
import { count, desc, eq } from 'drizzle-orm';
import type { DbType } from '../drizzle/db';
import { DRIZZLE } from '../drizzle/drizzle.module';
import { User, users } from '../drizzle/schema';
import { NewUserInput, UsersRepository } from './users.repository';

@Injectable()
export class DrizzleUsersRepository extends UsersRepository {
    constructor(@Inject(DRIZZLE) private readonly db: DbType) {
        super();
    }

    async count(): Promise<number> {
        const [{ total }] = await this.db.select({ total: count() }).from(users);
        return Number(total);
    }

    async findAll(): Promise<User[]> {
        return this.db.query.users.findMany({
            orderBy: [desc(users.createdAt), desc(users.id)],
        });
    }

    async findById(id: number): Promise<User | undefined> {
        return this.db.query.users.findFirst({ where: eq(users.id, id) });
    }

    async findByEmail(email: string): Promise<User | undefined> {
        return this.db.query.users.findFirst({ where: eq(users.email, email) });
    }

    async create(input: NewUserInput): Promise<User> {
        const [newUser] = await this.db.insert(users).values(input).returning();
        return newUser;
    }

    async setActive(id: number, isActive: boolean): Promise<User | undefined> {
        const [updated] = await this.db
            .update(users)
            .set({ isActive, updatedAt: new Date() })
            .where(eq(users.id, id))
            .returning();

        return updated;
    }

    async remove(id: number): Promise<boolean> {
        const deleted = await this.db
            .delete(users)
            .where(eq(users.id, id))
            .returning({ id: users.id });

        return deleted.length > 0;
    }
}
