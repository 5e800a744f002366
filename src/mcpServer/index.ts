#!/usr/bin/env node
import Logger, { errorMessage } from './logger';
import { startServer } from './server';

export * from './server';

// node で直接起動されたときだけサーバを開始する
if (require.main === module) {
    startServer().catch(error => {
        Logger.error('[MCP Server] Failed to start server:', null, { err: errorMessage(error) });
        process.exit(1);
    });
}
