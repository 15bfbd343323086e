#!/usr/bin/env node
// xml-validate CLI

import chalk from 'chalk';
import { runCli } from './run.js';

process.exitCode = await runCli(process.argv.slice(2), {
  io: {
    stdout: text => {
      process.stdout.write(text);
    },
    stderr: text => {
      process.stderr.write(text);
    },
    colorLevel: chalk.level
  }
});
