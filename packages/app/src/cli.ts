#!/usr/bin/env node

/**
 * CLI entry point for the zonescope command
 */

// Load environment variables from .env file
import 'dotenv/config';

import chalk from 'chalk';
import { isZoneScopeError } from '@zonescope/contracts';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    const code = isZoneScopeError(error) ? chalk.dim(` [${error.code}]`) : '';
    console.error(chalk.red(`❌ ${message}`) + code);
    process.exitCode = 1;
  });
