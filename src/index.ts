#!/usr/bin/env node

import { consolePrompt, runCli } from './cli.js';

runCli(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  color: process.stdout.isTTY === true,
  prompt: process.stdin.isTTY ? consolePrompt : undefined,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 2;
  },
);
