/**
 * PagePlus CLI - Main Entry Point
 */

import { runCLI } from './cli.js';
import { handleError, setupGlobalErrorHandlers } from './utils/error-handler.js';

async function main(): Promise<void> {
  const verbose = process.argv.includes('--verbose') || process.argv.includes('-v');
  setupGlobalErrorHandlers(verbose);

  try {
    await runCLI();
  } catch (error) {
    handleError(error, verbose);
  }
}

void main();
