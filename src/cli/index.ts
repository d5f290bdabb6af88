#!/usr/bin/env node

import { config } from 'dotenv';
import { runCli } from './program.js';

config({ quiet: true });

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

runCli(process.argv, { signal: controller.signal }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
