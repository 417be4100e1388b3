#!/usr/bin/env node

import { createCLI } from './cli/commands.js';
import { ErrorHandler } from './utils/errorHandler.js';

async function main(): Promise<void> {
  const controller = new AbortController();
  ErrorHandler.setupGlobalHandlers(controller);

  try {
    const program = createCLI(controller);
    await program.parseAsync();
  } catch (error) {
    ErrorHandler.handle(error);
  }
}

void main();
