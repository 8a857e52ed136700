#!/usr/bin/env node
import { runJob } from '../run-job';
import { processTerminal } from '../terminal';

runJob(process.argv.slice(2), { terminal: processTerminal }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
