#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Run in the folder holding "Performer Data.xlsx" and the performer clips;
 * writes FINAL_VIDEO.mp4 there. All flags are optional.
 */

import dotenv from 'dotenv';
import { loadCompilationConfig } from './config/compilation.js';
import type { ConfigOverrides } from './config/compilation.js';
import { logCriticalError } from './services/errorTracking.js';
import { runCompilation } from './services/pipeline.js';

dotenv.config();

const USAGE = `Usage: performer-compilation [options]

Builds FINAL_VIDEO.mp4 from "Performer Data.xlsx" and "<Name>_<Location>.mp4" clips.

Options:
  --workdir <dir>        Folder with the spreadsheet and clips (default: current folder)
  --spreadsheet <file>   Roster spreadsheet (default: "Performer Data.xlsx")
  --output <file>        Output video (default: FINAL_VIDEO.mp4)
  --duration <seconds>   Title card duration (default: 5)
  --font <file>          Bold sans-serif font file for title cards
  --title-case           Title-case names and composition details on the cards
  -h, --help             Show this message`;

export interface CliOptions {
  help: boolean;
  overrides: ConfigOverrides;
}

const VALUE_FLAGS = {
  '--workdir': 'workDir',
  '--spreadsheet': 'spreadsheetPath',
  '--output': 'outputPath',
  '--duration': 'cardDurationSeconds',
  '--font': 'fontPath',
} as const satisfies Record<string, keyof ConfigOverrides>;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg);
}

/**
 * Parse command-line flags into configuration overrides
 *
 * @throws Error on an unknown flag or a flag missing its value
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const overrides: ConfigOverrides = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      help = true;
    } else if (arg === '--title-case') {
      overrides.titleCase = true;
    } else if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      overrides[VALUE_FLAGS[arg]] = value;
      i++;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return { help, overrides };
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const config = loadCompilationConfig(process.env, options.overrides);
    const result = await runCompilation(config);

    console.log(
      `Final video is ready! ${result.outputPath} ` +
      `(${result.performerCount} performers, ${(result.elapsedMs / 1000).toFixed(1)}s)`
    );
    if (result.warnings.length > 0) {
      console.log(`${result.warnings.length} warning(s):\n${result.warnings.map(w => `  - ${w}`).join('\n')}`);
    }
    return 0;
  } catch (error) {
    logCriticalError(error, { operation: 'compilation' });
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      logCriticalError(error, { operation: 'cli' });
      process.exitCode = 1;
    }
  );
}
