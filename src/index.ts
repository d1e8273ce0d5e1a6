#!/usr/bin/env node
/**
 * Main Entry Point
 *
 * Imports the count files waiting in the input directory.
 */

import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { CountProcessor } from './processor.js';
import { JsonCountStore } from './storage.js';
import { formatDuration } from './utils/index.js';

// Load environment variables from .env file
dotenv.config();

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const startTime = new Date();

  try {
    const config = loadConfig();

    // Print header
    console.log('='.repeat(60));
    console.log('Traffic Count Import');
    console.log('='.repeat(60));
    console.log(`Start time: ${startTime.toISOString()}`);
    console.log(`Input directory: ${config.inputDir}`);
    console.log(`Data directory: ${config.dataDir}`);
    console.log('='.repeat(60));

    const processor = new CountProcessor({
      store: new JsonCountStore(config.dataDir),
      inputDir: config.inputDir,
      cleanupFiles: config.cleanupFiles,
    });

    const summary = await processor.processAll();

    const endTime = new Date();
    console.log('='.repeat(60));
    console.log(summary.failedFiles === 0 ? 'Import completed successfully!' : 'IMPORT COMPLETED WITH ERRORS');
    console.log(`End time: ${endTime.toISOString()}`);
    console.log(`Duration: ${formatDuration(endTime.getTime() - startTime.getTime())}`);
    console.log(`Files imported: ${summary.successfulFiles}/${summary.totalFiles}`);
    console.log(`Rows written: ${summary.results.reduce((sum, r) => sum + r.rowsWritten, 0)}`);
    console.log('='.repeat(60));

    process.exit(summary.failedFiles === 0 ? 0 : 1);
  } catch (error) {
    // Print error footer
    console.error('\n' + '='.repeat(60));
    console.error('IMPORT FAILED');
    console.error('='.repeat(60));
    console.error('Error:', error instanceof Error ? error.message : String(error));

    if (error instanceof Error && error.stack) {
      console.error('\nStack trace:');
      console.error(error.stack);
    }

    console.error('='.repeat(60));
    process.exit(1);
  }
}

// Start the application
void main();
