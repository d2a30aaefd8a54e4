#!/usr/bin/env node
// pdf-renamer command line entry point
import { EXIT_FATAL, runCli } from './cli';

process.on('unhandledRejection', (reason) => {
  console.error('[Main] Unhandled rejection:', reason);
  process.exitCode = EXIT_FATAL;
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[Main] Fatal error:', error);
    process.exitCode = EXIT_FATAL;
  });
