#!/usr/bin/env node
/**
 * Listing Validator CLI - offline pre-submission gate for Google Play metadata
 */

import { createProgram } from './program.js';

createProgram().parse();
