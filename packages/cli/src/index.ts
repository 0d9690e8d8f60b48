#!/usr/bin/env -S node --no-node-snapshot --import tsx

import { createProgram } from './program.js';
import { reportError } from './utils.js';

createProgram()
  .parseAsync()
  .catch(reportError);
