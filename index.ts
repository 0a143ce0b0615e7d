#!/usr/bin/env node

import { main } from './src/cli';
import * as logger from './src/utils/logger';
import { errorMessage } from './src/core/errors';

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error(errorMessage(err));
      process.exitCode = 1;
    },
  );
}
