#!/usr/bin/env node
import { runFromEnvironment } from './sync/run.js';

process.exitCode = await runFromEnvironment();
