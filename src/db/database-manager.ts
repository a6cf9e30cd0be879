import type { FastifyBaseLogger } from "fastify";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import type { AppConfig } from "../plugins/config-plugin";
import { schema } from "./schema";

export interface DatabaseConfig {
  connectionString: string;
  maxRetries: number;
  retryDelayMs: number;
  pool?: {
    min?: number;
    max?: number;
  };
}

export type DrizzleDB = NodePgDatabase<typeof schema>;

export class DatabaseManager {
  private readonly logger: FastifyBaseLogger;
  private readonly config: DatabaseConfig;
  private pool: Pool | null = null;
  private db: DrizzleDB | null = null;

  constructor(appConfig: AppConfig, logger: FastifyBaseLogger) {
    this.logger = logger;
    this.config = this.buildDatabaseConfig(appConfig);
  }

  private buildDatabaseConfig(appConfig: AppConfig): DatabaseConfig {
    return {
      connectionString: appConfig.DATABASE_URL,
      maxRetries: appConfig.DATABASE_CONNECT_RETRIES,
      retryDelayMs: 2000,
      pool: {
        min: appConfig.DATABASE_POOL_MIN,
        max: appConfig.DATABASE_POOL_MAX,
      },
    };
  }

  async connect(): Promise<DrizzleDB> {
    if (this.db) {
      return this.db;
    }

    const { maxRetries, retryDelayMs } = this.config;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        this.logger.info(
          `Connecting to PostgreSQL database... (attempt ${attempt}/${maxRetries})`
        );
        this.pool = new Pool({
          connectionString: this.config.connectionString,
          min: this.config.pool?.min,
          max: this.config.pool?.max,
        });
        const client = await this.pool.connect();
        await client.query("SELECT 1");
        client.release();
        this.db = drizzle(this.pool, { schema });
        this.setupPoolEventHandlers();
        this.logger.info("Successfully connected to PostgreSQL database");
        return this.db;
      } catch (error) {
        this.logger.error(
          { error, attempt },
          `Failed to connect to PostgreSQL database (attempt ${attempt}/${maxRetries})`
        );

        await this.releaseFailedPool();

        if (attempt === maxRetries) {
          throw error;
        }

        this.logger.info(`Retrying database connection in ${retryDelayMs}ms...`);
        await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
      }
    }

    throw new Error("Failed to connect to database after all retries");
  }

  private async releaseFailedPool(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    try {
      await pool.end();
    } catch (error) {
      this.logger.warn({ error }, "Failed to close database pool");
    }
  }

  private setupPoolEventHandlers(): void {
    if (!this.pool) return;
    this.pool.on("connect", () => {
      this.logger.debug("New database client connected");
    });
    this.pool.on("acquire", () => {
      this.logger.debug("Database client acquired from pool");
    });
    this.pool.on("remove", () => {
      this.logger.debug("Database client removed from pool");
    });
    this.pool.on("error", (error) => {
      this.logger.error({ error }, "Database pool error");
    });
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      this.logger.info("Disconnecting from PostgreSQL database...");
      await this.pool.end();
      this.pool = null;
      this.db = null;
      this.logger.info("Disconnected from PostgreSQL database");
    }
  }
}
