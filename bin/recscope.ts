#!/usr/bin/env node

import { main } from '../cli/index';
import { cliLogger as logger } from '@core/utils/logger';

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unhandled CLI failure', { error: error instanceof Error ? error.stack : String(error) });
    process.exitCode = 1;
  });
