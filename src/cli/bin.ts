#!/usr/bin/env node
import { createProgram } from "./program.js";

createProgram()
  .parseAsync()
  .then(() => {
    // Idle keep-alive sockets in the fetch pool would otherwise hold the process open.
    process.exit();
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
