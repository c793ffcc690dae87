#!/usr/bin/env node
import 'source-map-support/register';
import { runCli } from '../lib/cli/commands';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
