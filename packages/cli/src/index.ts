#!/usr/bin/env -S node --import tsx

import { program } from './cli/index.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(2);
});
