#!/usr/bin/env node
import { diagnosticLine, EXIT_FAILURE, EXIT_INTERRUPTED, runCli } from './program.js';

runCli(process.argv.slice(2)).then(
    (code) => {
        if (code === EXIT_INTERRUPTED) {
            // killed children may still hold handles open; do not wait for them
            process.exit(code);
        }
        process.exitCode = code;
    },
    (error: unknown) => {
        process.stderr.write(diagnosticLine(error));
        process.exit(EXIT_FAILURE);
    }
);
