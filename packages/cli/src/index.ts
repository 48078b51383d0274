import { errorMessage } from '@armport/core';
import chalk from 'chalk';

import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exit(1);
  });
