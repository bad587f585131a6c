#!/usr/bin/env node
import { Command, program } from 'commander';
import * as dotenv from 'dotenv';
import { runDetection } from './commands/detect.js';
import { CliOptions } from './options.js';

dotenv.config();

program
    .name('interaction-detector')
    .description('Behavior-based detection of hover and popup interactions on a web page')
    .version('1.0.0');

function withDetectorOptions(command: Command): Command {
    return command
        .option('--url <url>', 'URL to analyze', process.env.DETECTOR_URL)
        .option('--hover-parallel <number>', 'Concurrent hover simulations')
        .option('--click-parallel <number>', 'Concurrent click simulations')
        .option('--max-hover <number>', 'Maximum hover candidates simulated')
        .option('--max-click <number>', 'Maximum click candidates simulated')
        .option('--deadline <ms>', 'Overall run budget in milliseconds')
        .option('--no-hover', 'Skip hover simulation')
        .option('--no-popups', 'Skip click/popup simulation')
        .option('--headless', 'Run in headless mode', true)
        .option('--no-headless', 'Run in visible mode')
        .option('--quiet', 'Suppress progress logs', false);
}

withDetectorOptions(program.command('detect', { isDefault: true }))
    .description('Classify, simulate and print the full page analysis as JSON')
    .action(async (options: CliOptions) => {
        await runDetection('detect', options);
    });

withDetectorOptions(program.command('scan'))
    .description('Classify only (no simulation) and print candidates as JSON')
    .action(async (options: CliOptions) => {
        await runDetection('scan', options);
    });

await program.parseAsync();
