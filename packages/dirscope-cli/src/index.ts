#!/usr/bin/env tsx

/**
 * dirscope - gitignore-aware directory trees
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
