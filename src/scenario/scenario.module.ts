import { Module } from '@nestjs/common';
import { StreamModule } from '../stream/stream.module';
import { ValidationModule } from '../validation/validation.module';
import { ScenarioService } from './scenario.service';

@Module({
  imports: [StreamModule, ValidationModule],
  providers: [ScenarioService],
  exports: [ScenarioService],
})
export class ScenarioModule {}
