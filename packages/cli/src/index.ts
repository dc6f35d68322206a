#!/usr/bin/env -S node --import tsx
/**
 * @module @imageforge/cli
 * CLI entry point for imageforge.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
