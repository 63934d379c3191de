import type { User } from '../drizzle/schema';
import { NewUserInput, UsersRepository } from '../users/users.repository';
import { InMemoryStore } from './in-memory-store';

export class InMemoryUsersRepository extends UsersRepository {
  constructor(readonly store: InMemoryStore = new InMemoryStore()) {
    super();
  }

  async count(): Promise<number> {
    return this.store.users.length;
  }

  async findAll(): Promise<User[]> {
    return [...this.store.users].sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id,
    );
  }

  async findById(id: number): Promise<User | undefined> {
    return this.store.users.find((user) => user.id === id);
  }

  async findByEmail(email: string): Promise<User | undefined> {
    return this.store.users.find((user) => user.email === email);
  }

  async create(input: NewUserInput): Promise<User> {
    const now = new Date();
    const user: User = {
      id: this.store.nextId('users'),
      ...input,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.store.users.push(user);
    return user;
  }

  async setActive(id: number, isActive: boolean): Promise<User | undefined> {
    const index = this.store.users.findIndex((user) => user.id === id);
    if (index === -1) {
      return undefined;
    }
    const updated = { ...this.store.users[index], isActive, updatedAt: new Date() };
    this.store.users[index] = updated;
    return updated;
  }

  async remove(id: number): Promise<boolean> {
    const before = this.store.users.length;
    this.store.users = this.store.users.filter((user) => user.id !== id);
    return this.store.users.length < before;
  }
}
