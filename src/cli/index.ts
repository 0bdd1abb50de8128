#!/usr/bin/env node
// src/cli/index.ts

import { Command, InvalidArgumentError, Option } from 'commander';
import cliProgress from 'cli-progress';
import pLimit from 'p-limit';
import { readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import type { ILogger, TargetMode } from '../@types/index.js';
import { analyze } from '../core/forensics/index.js';
import { getDefaultRegistry, shutdownDefaultRegistry } from '../core/extractor/registry.js';
import { loadImage, stripMetadata, writeImage } from '../core/imageProcessing/processor.js';
import { levelToSpec, protect, score, shieldProgressTotal } from '../core/shield/index.js';
import { embed, extract } from '../core/watermark/index.js';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.js';

type GlobalOptions = {
    log?: boolean;
    verbose?: boolean;
};

const program = new Command();
program
    .name('pngprotect')
    .description('Watermark, shield and inspect raster images')
    .version('1.0.0')
    .option('-l, --log', 'Enable logging')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError();

function integerInRange(min: number, max: number) {
    return (value: string): number => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
            throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`);
        }
        return parsed;
    };
}

function isTargetMode(value: string): value is TargetMode {
    return value === 'untargeted' || value === 'embedding';
}

/**
 * Engine loggers honouring the global flags, and a console logger for results.
 */
function loggers(name: string): { logger: ILogger; output: ILogger; isLogging: boolean } {
    const { log, verbose } = program.opts<GlobalOptions>();
    const isLogging = log === true;
    const facility = isLogging ? console : NoopLogFacility;
    getLogger('extractor', facility, verbose === true);
    return {
        logger: getLogger(name, facility, verbose === true),
        output: getLogger('pngprotect', console, verbose === true),
        isLogging,
    };
}

/**
 * Runs `task` over every input with a pool of CPU count - 1 workers.
 */
async function forEachImage(inputs: string[], task: (imagePath: string) => Promise<void>): Promise<void> {
    const limit = pLimit(Math.max(1, os.cpus().length - 1));
    await Promise.all(inputs.map((input) => limit(() => task(path.resolve(input)))));
}

async function runCommand(logger: ILogger, label: string, command: () => Promise<void>): Promise<void> {
    try {
        await command();
        shutdownDefaultRegistry();
    } catch (error) {
        logger.error(`${label} failed: ${error instanceof Error ? error.message : String(error)}`);
        shutdownDefaultRegistry();
        process.exit(1);
    }
}

program
    .command('embed')
    .description('Embed an owner id watermark into an image')
    .requiredOption('-i, --input <file>', 'Input image')
    .requiredOption('-o, --output <file>', 'Output PNG file')
    .requiredOption('--owner <id>', 'Owner id to embed')
    .option('-s, --strength <number>', 'Watermark strength 1-10 (Default: 5)', integerInRange(1, 10), 5)
    .action(async (options: { input: string; output: string; owner: string; strength: number }) => {
        const { logger, output } = loggers('watermark');
        await runCommand(output, 'Embedding', async () => {
            const image = await loadImage(path.resolve(options.input));
            const result = embed(image, options.owner, options.strength, { logger });
            await writeImage(result.image, path.resolve(options.output));
            output.success(
                `Embedded "${options.owner}" at strength ${result.strength}: ${result.copies} copies, ` +
                    `${(result.utilization * 100).toFixed(2)}% of capacity per copy.`,
            );
        });
    });

program
    .command('extract')
    .description('Recover the owner id from watermarked images')
    .argument('<images...>', 'Images to read')
    .action(async (images: string[]) => {
        const { logger, output } = loggers('watermark');
        await runCommand(output, 'Extraction', () =>
            forEachImage(images, async (imagePath) => {
                const result = extract(await loadImage(imagePath), { logger });
                const owner = result.payload ? `"${result.payload.ownerId}"` : '-';
                output.info(
                    `${path.basename(imagePath)}: ${result.validity} owner ${owner} ` +
                        `(strength ${result.strength ?? '-'}, ${result.validCopies}/${result.copiesFound} valid copies)`,
                );
            }),
        );
    });

program
    .command('protect')
    .description('Add an adversarial shield to an image')
    .requiredOption('-i, --input <file>', 'Input image')
    .requiredOption('-o, --output <file>', 'Output PNG file')
    .option('--level <number>', 'Protection level 0-100 (Default: 50)', integerInRange(0, 100), 50)
    .addOption(
        new Option('--mode <mode>', 'Objective to push the model away from').choices(['untargeted', 'embedding']).default(
            'untargeted',
        ),
    )
    .action(async (options: { input: string; output: string; level: number; mode: string }) => {
        const { logger, output, isLogging } = loggers('shield');
        const targetMode = isTargetMode(options.mode) ? options.mode : 'untargeted';

        await runCommand(output, 'Protection', async () => {
            const image = await loadImage(path.resolve(options.input));

            let progressBar: cliProgress.SingleBar | undefined;
            if (!isLogging) {
                progressBar = new cliProgress.SingleBar(
                    {
                        format: 'Processing |{bar}| {percentage}% || {value}/{total} state: {state}',
                        barCompleteChar: '█',
                        barIncompleteChar: '░',
                        hideCursor: true,
                    },
                    cliProgress.Presets.shades_grey,
                );
                progressBar.start(shieldProgressTotal(levelToSpec(options.level, targetMode)), 0, { state: 'LOADING' });
            }

            const abort = new AbortController();
            const onInterrupt = () => abort.abort();
            process.once('SIGINT', onInterrupt);
            try {
                const result = await protect(image, options.level, {
                    logger,
                    targetMode,
                    signal: abort.signal,
                    progressBar,
                    registry: getDefaultRegistry(),
                });
                progressBar?.stop();
                await writeImage(result.image, path.resolve(options.output));
                output.success(
                    `Protected at level ${options.level}: robustness ${result.robustnessScore}, ` +
                        `distortion ${result.distortion.toFixed(4)}${result.budgetRescaled ? ' (budget rescaled)' : ''}.`,
                );
            } finally {
                progressBar?.stop();
                process.off('SIGINT', onInterrupt);
            }
        });
    });

program
    .command('score')
    .description('Score how resistant images are to feature extraction')
    .argument('<images...>', 'Images to score')
    .action(async (images: string[]) => {
        const { logger, output } = loggers('shield');
        await runCommand(output, 'Scoring', () =>
            forEachImage(images, async (imagePath) => {
                const result = await score(await loadImage(imagePath), { logger });
                output.info(`${path.basename(imagePath)}: robustness ${result}`);
            }),
        );
    });

program
    .command('analyze')
    .description('Estimate whether watermarked images were tampered with')
    .argument('<images...>', 'Images to analyze')
    .option('--owner <id>', 'Owner id the images are claimed to carry')
    .action(async (images: string[], options: { owner?: string }) => {
        const { logger, output } = loggers('forensics');
        await runCommand(output, 'Analysis', () =>
            forEachImage(images, async (imagePath) => {
                const verdict = analyze(await loadImage(imagePath), options.owner, { logger });
                const match = verdict.ownerMatch === null ? '' : `, owner match: ${verdict.ownerMatch}`;
                output.info(
                    `${path.basename(imagePath)}: tamper confidence ${verdict.tamperConfidence}` +
                        ` [${verdict.flags.join(', ') || 'no flags'}]${match}`,
                );
            }),
        );
    });

program
    .command('strip')
    .description('Remove embedded metadata from an image file')
    .requiredOption('-i, --input <file>', 'Input image')
    .requiredOption('-o, --output <file>', 'Output file')
    .action(async (options: { input: string; output: string }) => {
        const { output } = loggers('metadata');
        await runCommand(output, 'Stripping', async () => {
            const stripped = await stripMetadata(await readFile(path.resolve(options.input)));
            await writeFile(path.resolve(options.output), stripped);
            output.success(`Wrote ${stripped.length} bytes without metadata to ${options.output}.`);
        });
    });

await program.parseAsync(process.argv);
