import path from 'path';
import { config } from '../config/harvest.config';
import { loadGamesCsv } from '../services/csv.service';
import { updateReadme } from '../services/stats/readme.service';
import { findInputCsv, findReadmePath } from '../utils/files';
import { NoInputError, describeFailure } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseAnalyzeArgs } from './cli-options';

async function run(): Promise<void> {
  const cwd = process.cwd();
  const { csvFile: requested } = parseAnalyzeArgs(process.argv.slice(2));
  // The harvester writes to the output directory; the working directory is the fallback
  const searched = Array.from(new Set([path.resolve(config.outputDir), cwd]));
  const csvFile = requested ?? findInputCsv(searched);

  if (!csvFile) {
    throw new NoInputError(searched);
  }

  logger.info(`📊 Analyzing ${path.relative(cwd, csvFile) || csvFile} …`);
  const records = loadGamesCsv(csvFile);

  const readmePath = findReadmePath(cwd);
  const update = updateReadme(readmePath, records);
  logger.info(
    `✅ README ${update.changed ? 'updated' : 'already up to date'}: ${readmePath} (${update.stats.total} games)`
  );
  logger.info('🏁 Done.');
}

run().catch((error) => {
  logger.error(describeFailure(error, 'analyze'));
  process.exitCode = 1;
});
