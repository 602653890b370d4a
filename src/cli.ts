#!/usr/bin/env node

import process from 'process';
import { runCli } from './program.js';

await runCli(process.argv);
