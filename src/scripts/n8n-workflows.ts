#!/usr/bin/env node
/**
 * n8n workflow management CLI
 *
 * Usage:
 *   npm run n8n -- list
 *   npm run n8n -- create blueprint.json --name "Inbox triage"
 *   npm run n8n -- executions list --status error
 */

import 'dotenv/config';
import { createProgram } from './cli.js';
import { getConfig } from '../utils/config.js';
import { handleError } from '../utils/error-handler.js';
import { configureLogger } from '../utils/logger.js';

try {
  configureLogger(getConfig().logging.level);
} catch (error) {
  handleError(error, 'Load configuration');
  process.exit(1);
}

await createProgram().parseAsync();
