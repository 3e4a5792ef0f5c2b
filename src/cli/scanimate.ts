#!/usr/bin/env node
import { randomUUID } from 'node:crypto';

import {
  GenerateScanimationCommand,
  GenerateScanimationHandler,
} from '../application/scanimation/index.js';
import {
  CanvasFrameResampler,
  FileImageSink,
  FilesystemFrameSource,
} from '../infrastructure/scanimation/index.js';
import { ScanimationError } from '../shared/errors/base.error.js';
import { logger } from '../shared/logger/pino.js';

import { parseCliArgs, toCommandInput, USAGE } from './args.js';

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }

  const handler = new GenerateScanimationHandler({
    frameSource: new FilesystemFrameSource(),
    imageSink: new FileImageSink(),
    resampler: new CanvasFrameResampler(),
  });

  const outcome = await handler.execute(new GenerateScanimationCommand(toCommandInput(options, randomUUID())));

  logger.info(
    {
      size: `${outcome.width}x${outcome.height}`,
      frames: outcome.frameLabels,
      period: outcome.period,
      stripes: outcome.stripeCount,
      base: outcome.basePath,
      mask: outcome.maskPath ?? null,
    },
    'Scanimation complete',
  );
}

main().catch((error: unknown) => {
  if (error instanceof ScanimationError) {
    logger.fatal({ code: error.code, metadata: error.metadata }, error.message);
  } else {
    logger.fatal({ error }, error instanceof Error ? error.message : 'Unexpected failure');
    process.stderr.write(USAGE);
  }
  process.exitCode = 1;
});
