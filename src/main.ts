#!/usr/bin/env node
import { run } from './Driver';

run().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
