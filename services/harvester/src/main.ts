#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli.js';
import { errorMessage } from './errors.js';

dotenv.config();

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`geoharvest: ${errorMessage(e)}\n`);
    process.exitCode = 1;
  },
);
