#!/usr/bin/env node
import { cli } from './cli.js';
import { reportError } from './commands/shared.js';

cli.parseAsync(process.argv).catch(reportError);
