import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { JdbcStoreService } from './jdbc-store.service';

@Module({
  imports: [DatabaseModule],
  providers: [JdbcStoreService],
  exports: [JdbcStoreService],
})
export class ValidationModule {}
