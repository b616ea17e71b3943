#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readDocumentSet } from './catalog-writer.js';
import { convert, exitCodeFor } from './convert.js';
import { LOG_LEVELS } from './env.js';
import { toWarning } from './errors.js';
import type { LinkViolation } from './errors.js';
import { validateDocumentSet } from './links.js';
import logger, { setLogLevel } from './log.js';

const log = logger.child({ component: 'cli' });

interface ConvertArgv {
  inputFolder: string;
  outputFolder: string;
  workers?: number;
  checksums?: boolean;
}

async function runConvert(argv: ConvertArgv): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    const report = await convert({
      inputFolder: argv.inputFolder,
      outputFolder: argv.outputFolder,
      workerCount: argv.workers,
      checksums: argv.checksums,
      signal: controller.signal,
    });
    if (report.fatal) {
      log.error(`Run failed: ${report.fatal.message}`, { code: report.fatal.code });
    }
    return exitCodeFor(report);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

/**
 * Check the link graph of a persisted catalog
 *
 * @param catalogFolder - the catalog directory
 * @returns 0 when the catalog is sound, 1 otherwise
 */
export async function runValidate(catalogFolder: string): Promise<number> {
  let violations: LinkViolation[];
  try {
    violations = validateDocumentSet(await readDocumentSet(catalogFolder));
  } catch (error) {
    const warning = toWarning(error, catalogFolder);
    log.error(`Catalog could not be read: ${warning.message}`, { code: warning.code });
    return 1;
  }
  for (const v of violations) {
    log.error(`${v.source} -[${v.rel}]-> ${v.target}: ${v.problem}`);
  }
  log.info(`${violations.length} link graph violations in ${catalogFolder}`);
  return violations.length > 0 ? 1 : 0;
}

/**
 * Entrypoint which does command line parsing.
 *
 * @param args - the command line arguments, absent any program name
 * @returns the process exit code
 */
export default async function main(args: string[]): Promise<number> {
  let exitCode = 0;
  await yargs(args)
    .scriptName('gugik-stac')
    .usage('Usage: $0 <command> [options]')
    .option('log-level', {
      describe: 'log level for this run',
      choices: LOG_LEVELS,
      type: 'string',
    })
    .middleware((argv) => {
      if (typeof argv.logLevel === 'string') setLogLevel(argv.logLevel);
    })
    .command(
      'convert',
      'build the STAC catalog from downloaded datasets',
      (command) =>
        command
          .option('input-folder', {
            alias: 'i',
            describe: 'folder holding one directory per dataset',
            type: 'string',
            demandOption: true,
          })
          .option('output-folder', {
            alias: 'o',
            describe: 'folder the catalog is written to',
            type: 'string',
            demandOption: true,
          })
          .option('workers', {
            describe: 'number of files processed concurrently',
            type: 'number',
          })
          .option('checksums', {
            describe: 'compute file checksums of local assets',
            type: 'boolean',
          }),
      async (argv) => {
        exitCode = await runConvert(argv);
      }
    )
    .command(
      'validate',
      'check the link graph of a written catalog',
      (command) =>
        command.option('catalog-folder', {
          alias: 'c',
          describe: 'folder holding catalog.json',
          type: 'string',
          demandOption: true,
        }),
      async (argv) => {
        exitCode = await runValidate(argv.catalogFolder);
      }
    )
    .demandCommand(1)
    .strict()
    .parseAsync();
  return exitCode;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main(hideBin(process.argv)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log.error('Unexpected failure', { error });
      process.exitCode = 1;
    }
  );
}
