#!/usr/bin/env node
import { reportFatalError, runCli } from './solitaire';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.exit(reportFatalError(error));
  });
