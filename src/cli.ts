#!/usr/bin/env node
import { createProgram } from './command.js';
import { errorMessage } from './core/errors.js';

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        console.error(`Error: ${errorMessage(error)}`);
        process.exit(1);
    });
