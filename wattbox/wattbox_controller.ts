#!/usr/bin/env node
import { runCli } from './cli';

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error(`✗ Unexpected Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    });
