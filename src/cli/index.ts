#!/usr/bin/env node
import 'dotenv/config';
/**
 * billiards-qa CLI
 *
 * Generates MCQ datasets from simulated shot summaries and validates them.
 */

import { createProgram } from './program.js';

// ============================================================================
// Parse and Run
// ============================================================================

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
