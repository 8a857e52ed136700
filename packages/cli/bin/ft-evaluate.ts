#!/usr/bin/env node
import { evaluate } from '../evaluate';
import { processTerminal } from '../terminal';

evaluate(process.argv.slice(2), { terminal: processTerminal }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
