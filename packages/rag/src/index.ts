#!/usr/bin/env node
import process from 'node:process';
import { hideBin } from 'yargs/helpers';
import { runCli } from './cli.js';

runCli(hideBin(process.argv), process.cwd()).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Unexpected failure:', error);
    process.exitCode = 1;
  },
);
