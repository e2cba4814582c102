#!/usr/bin/env node
// src/index.ts
import { Command } from 'commander';
import { registerResolveCommand } from './cli/resolve.js';
import { registerSplitCommand } from './cli/split.js';

export function createProgram(): Command {
    const program = new Command();
    program
        .name('panorama-scope')
        .description('Resolve and split hierarchical firewall-manager configuration exports')
        .version('0.1.0');

    registerResolveCommand(program);
    registerSplitCommand(program);
    return program;
}

await createProgram().parseAsync(process.argv);
