#!/usr/bin/env -S node --import tsx
import { run } from './index';

process.exitCode = await run(process.argv);
