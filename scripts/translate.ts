#!/usr/bin/env node

import { ValidationError } from "../lib/sign/errors";
import { runTranslate } from "./run-translate";

runTranslate(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error) => {
    if (error instanceof ValidationError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("Error running translation:", error);
    }
    process.exit(1);
  },
);
