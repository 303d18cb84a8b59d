#!/usr/bin/env tsx
// src/cli.ts

import process from 'node:process';
import { createProgram } from './cli/index.ts';

await createProgram().parseAsync(process.argv);
