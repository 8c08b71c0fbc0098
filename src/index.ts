#!/usr/bin/env node
import { runJob } from "./job.js";
import { logger } from "./logger.js";

runJob()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((e) => {
        logger.error("Fatal", { error: String(e) });
        process.exit(1);
    });
