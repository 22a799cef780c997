#!/usr/bin/env node
import { runCli } from '../src/cli/main.js';
import { processOutput } from '../src/cli/utils/logger.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

runCli(process.argv.slice(2), { output: processOutput, readStdin, cwd: process.cwd() }).then(
  code => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(2);
  }
);
