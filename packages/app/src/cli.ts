#!/usr/bin/env -S node --import tsx

/**
 * CLI entry point for the ashare command
 */

import 'dotenv/config';
import { main } from './program.js';

process.exitCode = await main(process.argv);
