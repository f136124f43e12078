#!/usr/bin/env node
// src/main.ts

import { createServerConfig, parsePortArgument } from './config';
import { errorMessage } from './types';
import { StaticServer } from './server';

export const USAGE = 'Usage: static-httpd <port> <directory>';

async function main(argv: string[]): Promise<number> {
    if (argv.length < 2) {
        console.log(USAGE);
        return 1;
    }

    let server: StaticServer;
    try {
        const config = await createServerConfig({ port: parsePortArgument(argv[0]), baseDirectory: argv[1] });
        server = new StaticServer(config);
        await server.start();
    } catch (e) {
        console.error(errorMessage(e));
        return 1;
    }
    console.log('To stop the server, press Ctrl+C');

    // --- Graceful Shutdown ---
    const signal = await new Promise<NodeJS.Signals>((resolve) => {
        process.once('SIGINT', resolve);
        process.once('SIGTERM', resolve);
    });
    console.log(`\nReceived ${signal}. Shutting down gracefully...`);
    const complete = await server.stop();
    console.log(complete ? 'Server is closed. Exiting.' : 'Shutdown incomplete. Exiting.');
    return complete ? 0 : 1;
}

main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err) => {
        console.error('Fatal:', err);
        process.exit(1);
    }
);
