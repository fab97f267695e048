#!/usr/bin/env node
import { config } from 'dotenv';

// Load environment variables before anything reads them
config();

import('./cli')
  .then(({ main }) => main())
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
