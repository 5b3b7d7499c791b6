#!/usr/bin/env node
import { onInterrupt, run } from './cli.js';

const controller = new AbortController();
process.once('SIGINT', onInterrupt(controller));

run(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
