#!/usr/bin/env node

/**
 * modelpack CLI - prefetch, verify, inspect and clear cached model files
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
