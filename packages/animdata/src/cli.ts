#!/usr/bin/env tsx
import { runAnimDataCommand } from './console/animdata-command.ts';

await runAnimDataCommand(process.argv.slice(2));
