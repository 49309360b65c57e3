#!/usr/bin/env node
import { processIO } from '../cli/io';
import { runFixStructure } from '../cli/fix-structure';
import { createLogger } from '../logger';

const logger = createLogger();

runFixStructure(process.argv.slice(2), processIO(logger))
    .then(code => {
        process.exitCode = code;
    })
    .catch(err => {
        logger.error(err, 'Unhandled exception while scanning');
        process.exitCode = 1;
    });
