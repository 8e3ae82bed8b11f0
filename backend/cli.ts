#!/usr/bin/env node
/**
 * 命令行入口
 */
import 'dotenv/config';
import { main } from './interfaces/cli/index.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
