#!/usr/bin/env node

import { createCLI } from '../src/cli/index.js';
import { renderError } from '../src/cli/ui/render.js';
import { toError } from '../src/utils/errors.js';

const program = createCLI();

program.parseAsync(process.argv).catch((err: unknown) => {
    renderError(toError(err).message);
    process.exit(1);
});
