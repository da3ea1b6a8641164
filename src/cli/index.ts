#!/usr/bin/env node
import { createProgram } from './program.js';
import { reportError } from './io.js';

createProgram()
  .parseAsync(process.argv)
  .catch(reportError);
