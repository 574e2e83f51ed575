#!/usr/bin/env node
/**
 * auto-tagger command-line entry point
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
