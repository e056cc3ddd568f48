#!/usr/bin/env node

import { flush, handle, run } from '@oclif/core';

run(process.argv.slice(2), __dirname)
  .then(() => flush())
  .catch(handle);
