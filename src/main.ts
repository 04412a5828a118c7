#!/usr/bin/env node
import { run } from './cli/run';

process.exitCode = run(process.argv.slice(2), {
  out: (text) => console.log(text),
  err: (text) => console.error(text)
});
