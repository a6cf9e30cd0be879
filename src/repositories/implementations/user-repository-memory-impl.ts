import type { FastifyBaseLogger } from "fastify";
import { ErrorCode, RepositoryException } from "../../shared/errors";
import { FIELD_LIMITS } from "../../shared/field-limits";
import type {
  CreateUserInput,
  UserData,
  UserRepository,
} from "../user-repository";
import { cloneRecord, type MemoryStore } from "./memory-store";

export interface UserRepositoryMemoryImplDeps {
  store: MemoryStore;
  logger: FastifyBaseLogger;
}

export class UserRepositoryMemoryImpl implements UserRepository {
  private readonly store: MemoryStore;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: UserRepositoryMemoryImplDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
  }

  async createUser(input: CreateUserInput): Promise<UserData> {
    this.store.assertMaxLength(input.email, FIELD_LIMITS.userEmail, "email");
    const taken = [...this.store.users.values()].some(
      (user) => user.email === input.email
    );
    if (taken) {
      throw new RepositoryException(
        ErrorCode.CONSTRAINT_VIOLATION,
        "users_email_unique"
      );
    }
    const user: UserData = {
      id: this.store.nextId("users"),
      email: input.email,
    };
    this.store.users.set(user.id, user);
    this.logger.debug({ userId: user.id }, "User created in memory");
    return cloneRecord(user);
  }

  async getUserById(id: number): Promise<UserData | null> {
    const user = this.store.users.get(id);
    return user ? cloneRecord(user) : null;
  }
}
