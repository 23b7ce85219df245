#!/usr/bin/env node

import * as dotenv from "dotenv";
import { reportError, run } from "./cli.js";

dotenv.config();

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.exitCode = reportError(error);
  });
