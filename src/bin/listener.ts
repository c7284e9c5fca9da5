#!/usr/bin/env node
import { runCli } from "../cli";
import { describeError } from "../utils/errors";
import { createLogger } from "../utils/log";

const logger = createLogger(module);

runCli(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (e: unknown) => {
        logger.error(`Unexpected failure: ${describeError(e)}`);
        process.exitCode = 1;
    },
);
