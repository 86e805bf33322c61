#!/usr/bin/env node
import { cli } from './cli.js';
import { outputError } from './lib/output-formatter.js';

cli.parseAsync(process.argv).catch((error: unknown) => {
  outputError(error);
});
