#!/usr/bin/env node
import { main } from '../index.js';

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
