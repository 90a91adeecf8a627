#!/usr/bin/env node
import 'dotenv/config';
import { main } from '@/refinery';

main().then((code) => {
    process.exitCode = code;
}, (error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
});
