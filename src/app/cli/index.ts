#!/usr/bin/env node

/**
 * gridwalk CLI - bounded random walk simulator
 *
 * Usage:
 *   gridwalk                              - 100x100 walk of 100 steps from the centre
 *   gridwalk -W 20 -H 10 -s 200 --seed 7  - reproducible walk on a 20x10 grid
 *   gridwalk --render replay              - animate the path after the walk
 *   gridwalk --json                       - print statistics as JSON
 *   gridwalk -c walks/narrow.yaml         - read settings from a config file
 */

import { createRequire } from 'node:module';
import { resolve } from 'node:path';
import { createProgram } from './walkCommand.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

await createProgram(cliVersion, resolve(process.cwd())).parseAsync();
