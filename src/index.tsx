#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import chalk from 'chalk';
import { config } from 'dotenv';

import { CLI } from './cli.js';
import { configFromEnv, loadConfig, parseCliArgs, resolveSettings, USAGE } from './utils/index.js';

// Load environment variables
config({ quiet: true });

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
  console.error(chalk.red(`Error: ${parsed.error}`));
  console.error(USAGE);
  process.exit(1);
}

if (parsed.help) {
  console.log(USAGE);
  process.exit(0);
}

const settings = resolveSettings(loadConfig(), configFromEnv(), parsed.config);

const { waitUntilExit } = render(<CLI settings={settings} />, { exitOnCtrlC: false });
await waitUntilExit();
