#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { getProductionContainer } from './container.production.js';
import { AppError } from './errors.js';
import { runCli } from './cli/run.js';

async function main(): Promise<number> {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const container = getProductionContainer();
  try {
    return await runCli(process.argv.slice(2), container, {
      readFile: (path) => readFile(path, 'utf8'),
      out: (text) => console.log(text),
      signal: controller.signal,
    });
  } finally {
    await container.logProvider.flush();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof AppError) {
      console.error(`error [${err.code}]: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  }
);
