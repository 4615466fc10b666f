import { config, validateConfig } from '../config/harvest.config';
import { CatalogClient } from '../clients/CatalogClient';
import { HarvestService } from '../services/harvest/HarvestService';
import { writeGamesCsv } from '../services/csv.service';
import { attachHarvestLogger } from '../utils/harvest-logging';
import { defaultOutputPath } from '../utils/files';
import { describeFailure } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseHarvestArgs } from './cli-options';

async function run(): Promise<void> {
  validateConfig(config);

  const { options, output } = parseHarvestArgs(process.argv.slice(2), config.harvest);
  const outputPath = output ?? defaultOutputPath(new Date(), config.outputDir);

  const service = new HarvestService(new CatalogClient(config.catalog));
  attachHarvestLogger(service, logger);

  const result = await service.run(options);
  if (result.exhaustedAt !== undefined) {
    logger.info(`Must-play entries ran out at page ${result.exhaustedAt}`);
  }

  logger.info(`🔢 Final total: ${result.records.length} valid games`);
  const written = writeGamesCsv(result.records, outputPath);
  logger.info(`📁 CSV saved to ${written}`);
  logger.info('🏁 Done.');
}

run().catch((error) => {
  logger.error(describeFailure(error, 'harvest'));
  process.exitCode = 1;
});
