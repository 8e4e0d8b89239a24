#!/usr/bin/env node

import { main } from "./main.js";
import { currentEuid } from "./pipeline/privilege.js";
import { logger } from "./logger.js";

main({ euid: currentEuid() })
  .then(({ exitCode }) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    logger.fatal({ error: err }, "Fatal error");
    process.exitCode = 1;
  });
