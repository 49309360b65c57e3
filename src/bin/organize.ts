#!/usr/bin/env node
import { processIO } from '../cli/io';
import { runOrganize } from '../cli/organize';
import { createLogger } from '../logger';

const logger = createLogger();

runOrganize(process.argv.slice(2), processIO(logger))
    .then(code => {
        process.exitCode = code;
    })
    .catch(err => {
        logger.error(err, 'Unhandled exception while organizing');
        process.exitCode = 1;
    });
