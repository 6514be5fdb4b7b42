#!/usr/bin/env node
/**
 * simple-tools-server — stdio entry point for hosts that launch a command.
 */
import { startServer } from './startServer.js';

startServer().catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
