import { registerAs } from '@nestjs/config';
import { IsEnum, IsNotEmpty, IsString } from 'class-validator';
import { SinkPayloadFormat } from '../common/types';
import { validateConfig } from './config-validation';

/**
 * Where the connector service lives and which inputs the scenarios read
 */
export class HarnessConfig {
  @IsString()
  @IsNotEmpty()
  endpoint!: string;

  @IsString()
  @IsNotEmpty()
  inputFile!: string;

  @IsString()
  @IsNotEmpty()
  inputBinaryFile!: string;

  @IsEnum(SinkPayloadFormat)
  dataFormat!: SinkPayloadFormat;

  @IsString()
  @IsNotEmpty()
  scenariosPath!: string;

  @IsString()
  @IsNotEmpty()
  protoPath!: string;
}

export default registerAs('harness', (): HarnessConfig => {
  const rawConfig = {
    endpoint: process.env.SINK_ENDPOINT || 'localhost:50051',
    inputFile: process.env.INPUT_FILE || './data/sink_input.json',
    inputBinaryFile: process.env.INPUT_BINARY_FILE || './data/sink_input',
    dataFormat: (process.env.DATA_FORMAT || 'json').toUpperCase(),
    scenariosPath: process.env.SCENARIOS_PATH || './scenarios.yaml',
    protoPath: process.env.PROTO_PATH || './proto/connector_service.proto',
  };

  return validateConfig(rawConfig, 'harness', HarnessConfig);
});
