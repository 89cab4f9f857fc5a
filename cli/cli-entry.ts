/**
 * Main entry point for the modenv CLI application.
 */
/// <reference types="node" />
import { main } from './index';

export { main };

(async () => {
  try {
    await main(process.argv.slice(2));
    // Readline and file transports can hold the loop open
    process.exit(process.exitCode ?? 0);
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
})();
