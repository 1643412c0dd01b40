#!/usr/bin/env node
/**
 * plugdoc CLI - browse and check a plugin document tree
 */

import 'dotenv/config';
import { runCli } from './run.js';
import { colors } from './ui.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(colors.error('✗ Error: ') + (error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  });
