#!/usr/bin/env node
import dotenv from 'dotenv';
import { errorMessage } from '../utils/logger.js';
import { resolvePackageVersion } from '../utils/package-info.js';
import { createEnvContext } from './context.js';
import { buildProgram } from './program.js';

dotenv.config({ quiet: true });

buildProgram(createEnvContext(), resolvePackageVersion()).parseAsync(process.argv).catch((err: unknown) => {
    console.error('Error:', errorMessage(err));
    process.exit(1);
});
