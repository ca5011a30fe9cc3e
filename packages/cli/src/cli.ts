#!/usr/bin/env node
/**
 * @fileoverview rudder CLI entry point
 */

import { main } from './main.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
