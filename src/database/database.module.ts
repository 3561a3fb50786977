import { Module } from '@nestjs/common';
import { DatabaseConnectionService } from './database-connection.service';

/**
 * Database module provides PostgreSQL client infrastructure
 * Exports DatabaseConnectionService for the result store reader
 */
@Module({
  providers: [DatabaseConnectionService],
  exports: [DatabaseConnectionService],
})
export class DatabaseModule {}
