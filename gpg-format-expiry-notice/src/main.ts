#!/usr/bin/env node
import { main } from './cli';

void main(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr, stdin: process.stdin })
    .then((code) => { process.exitCode = code; });
