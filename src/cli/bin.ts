#!/usr/bin/env node
import { main } from './index';

process.exitCode = await main(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  terminalColumns: process.stdout.isTTY ? process.stdout.columns : undefined,
  env: {
    ...process.env,
    // Piped output is never coloured.
    ...(!process.stdout.isTTY && { NO_COLOR: '1' })
  }
});
