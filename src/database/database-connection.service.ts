import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client } from 'pg';
import type { DatabaseConfig } from '../config/database.config';
import { errorMessage } from '../common/errors';

const DB_CONNECTION_TIMEOUT_MS = 10000;

/**
 * PostgreSQL client management for reading back sink results
 * Every client handed out is tracked and closed on shutdown
 */
@Injectable()
export class DatabaseConnectionService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseConnectionService.name);
  private clients: Set<Client> = new Set();

  constructor(private configService: ConfigService) {}

  /**
   * Open a client on the configured database
   * Fields in target replace the configured ones, so a sink's own url can pick the database
   */
  async connect(target: Partial<DatabaseConfig> = {}): Promise<Client> {
    const baseConfig = this.configService.get<DatabaseConfig>('database');

    if (!baseConfig) {
      throw new Error('Database configuration not found');
    }
    const config: DatabaseConfig = { ...baseConfig, ...target };

    this.logger.log(`Connecting to result store at ${config.host}:${config.port}/${config.database}`);

    const client = new Client({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      connectionTimeoutMillis: DB_CONNECTION_TIMEOUT_MS,
    });

    try {
      await client.connect();
      this.clients.add(client);
      this.logger.log('Connected to result store');
      return client;
    } catch (error) {
      this.logger.error('Failed to connect to result store');
      throw new Error(`Database connection failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async disconnect(client: Client): Promise<void> {
    try {
      await client.end();
      this.logger.log('Database connection closed');
    } finally {
      // Still forget the client even if end() fails
      this.clients.delete(client);
    }
  }

  async onModuleDestroy() {
    this.logger.log(`Closing ${this.clients.size} database connections`);

    const disconnectPromises = Array.from(this.clients).map(client =>
      this.disconnect(client).catch(error =>
        this.logger.error(`Error closing connection during shutdown: ${errorMessage(error)}`),
      ),
    );

    await Promise.all(disconnectPromises);
  }
}
