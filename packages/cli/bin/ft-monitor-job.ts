#!/usr/bin/env node
import { interruptOnSigint, monitorJob } from '../monitor-job';
import { processTerminal } from '../terminal';

monitorJob(process.argv.slice(2), { terminal: processTerminal, interrupt: () => interruptOnSigint() }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
