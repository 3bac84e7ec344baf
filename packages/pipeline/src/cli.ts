import { createLogger } from '@pagemill/logger';

import { CLI_USAGE, parseCliOptions } from './config/cli-options';
import { EXIT_CODE } from './config/constants';
import { loadPipelineConfig } from './config/pipeline-config';
import { ConfigurationError } from './errors/configuration-error';
import { PipelineOrchestrator } from './pipeline-orchestrator';

async function main(argv: readonly string[]): Promise<number> {
  try {
    const { flags, help } = parseCliOptions(argv);
    if (help) {
      console.log(CLI_USAGE);
      return EXIT_CODE.SUCCESS;
    }

    const config = loadPipelineConfig({ flags });
    const logger = createLogger({ level: config.logLevel });
    return await new PipelineOrchestrator(logger, config).run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      console.error('Run with --help for usage.');
      return EXIT_CODE.CONFIGURATION;
    }
    throw error;
  }
}

process.exitCode = await main(process.argv.slice(2));
