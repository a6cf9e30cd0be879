import type { FastifyBaseLogger } from "fastify";
import { eq } from "drizzle-orm";
import type { DrizzleDB } from "../../db/database-manager";
import { translatePostgresError } from "../../db/postgres-error";
import { users } from "../../db/schema";
import type {
  CreateUserInput,
  UserData,
  UserRepository,
} from "../user-repository";

export interface UserRepositoryDrizzleImplDeps {
  db: DrizzleDB;
  logger: FastifyBaseLogger;
}

export class UserRepositoryDrizzleImpl implements UserRepository {
  private readonly db: DrizzleDB;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: UserRepositoryDrizzleImplDeps) {
    this.db = deps.db;
    this.logger = deps.logger;
  }

  async createUser(input: CreateUserInput): Promise<UserData> {
    try {
      const [user] = await this.db
        .insert(users)
        .values({ email: input.email })
        .returning();
      this.logger.info({ userId: user.id }, "User record created");
      return user;
    } catch (error) {
      this.logger.error({ error }, "Failed to create user record");
      throw translatePostgresError(error, "write");
    }
  }

  async getUserById(id: number): Promise<UserData | null> {
    try {
      const result = await this.db
        .select()
        .from(users)
        .where(eq(users.id, id))
        .limit(1);
      return result[0] ?? null;
    } catch (error) {
      this.logger.error({ error, userId: id }, "Failed to get user by ID");
      throw translatePostgresError(error, "write");
    }
  }
}
