#!/usr/bin/env node

/**
 * chatrelay - Entry Point
 */

import * as dotenv from 'dotenv';
import { getConfig, printConfigInfo } from './config.js';
import { ChatCli } from './presentation/ChatCli.js';
import { ChatRelayError } from './core/errors.js';
import { setDebugLogging } from './utils/logger.js';

async function main(): Promise<number> {
  // Load environment variables from .env file
  dotenv.config();

  let cli: ChatCli | null = null;

  try {
    const config = getConfig();
    setDebugLogging(config.debug);
    if (config.debug) {
      printConfigInfo(config);
    }

    cli = new ChatCli(config);

    // A second Ctrl+C, or one outside of a streaming answer, quits
    process.on('SIGINT', () => {
      if (!cli?.interrupt()) {
        cli?.shutdown();
        process.exit(130);
      }
    });

    return await cli.run();
  } catch (error) {
    if (error instanceof ChatRelayError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    console.error('Fatal error in main():', error);
    return 1;
  } finally {
    cli?.shutdown();
  }
}

main().then(
  (code) => process.exit(code),
  (error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  }
);
