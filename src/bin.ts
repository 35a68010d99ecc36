#!/usr/bin/env node
// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { text } from 'node:stream/consumers';

import { runCli } from './cli.js';

runCli(process.argv.slice(2), {
  readStdin: () => text(process.stdin),
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`)
}).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
