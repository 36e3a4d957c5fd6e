import 'reflect-metadata';
import { parseArgs } from 'util';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { IngestionModule } from './ingestion.module';
import { IngestionService } from './ingestion.service';
import { RatingsService } from '../ratings/ratings.service';
import { applyLogLevels, resolveLogLevels } from '../config/env.schema';

const USAGE = 'Usage: ingest <playlist.json> [--export normalized.json] [--reconcile]';

async function main() {
  const logger = new Logger('Ingest');
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      export: { type: 'string' },
      reconcile: { type: 'boolean', default: false },
    },
  });

  const [filePath] = positionals;
  if (!filePath) {
    logger.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(IngestionModule, {
    logger: resolveLogLevels(),
  });

  try {
    applyLogLevels(app);
    const summary = await app
      .get(IngestionService)
      .ingestFile(filePath, { exportPath: values.export });

    logger.log(
      `Processed ${summary.records} records: ${summary.inserted} upserted, ${summary.skipped} skipped`,
    );

    if (values.reconcile) {
      const repaired = await app.get(RatingsService).reconcileAll();
      logger.log(`Rating caches repaired: ${repaired}`);
    }
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  new Logger('Ingest').error(
    'Ingestion failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
