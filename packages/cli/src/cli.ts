#!/usr/bin/env node
/**
 * loft-check binary
 *
 * Usage:
 *   loft-check main.lf lib.lf
 *   loft-check ast main.lf
 *   loft-check --explain LOFT-P003
 */

import { main } from './cli-check.js';

await main();
