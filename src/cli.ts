import { parseArgs, UsageError } from "./options";
import { runTagger } from "./tagger";

/**
 * CLI exit codes following Unix conventions.
 */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Prints usage information to stdout.
 */
function printUsage(): void {
  console.log(
    `
photolog-tag - Write description, date, GPS and keyword EXIF tags into a photo

Usage:
  photolog-tag --src <dir> --dest <dir> --logfile <file> [options]

Required:
  --src <dir>       Folder containing the source images
  --dest <dir>      Folder the tagged copies are written to
  --logfile <file>  JSON log, one {"date","outfile","description"} per line

Options:
  --geo <lat,long>  Coordinates to geotag with (use --geo="-45,32" when
                    latitude is negative)
  --alt <meters>    Altitude for the coordinates
  --tags <list>     Comma separated keywords, e.g. "school, daycare"
  --verbose         Log the date, GPS block and keywords written
  --help            Show this help message

Only the first record of the log that parses is processed.

Exit codes:
  0  Image tagged (or no usable record in the log)
  1  Error (path not found, not a JPEG, I/O failure)
  2  Invalid arguments
`.trim(),
  );
}

/**
 * Runs the CLI against an argv array and returns the exit code.
 *
 * Parses arguments, tags the image named by the first usable log
 * record, and reports what was written. Usage and coordinate errors
 * return `ExitCode.Usage`; any failure while tagging returns
 * `ExitCode.Failure`.
 */
export function run(argv: string[]): ExitCode {
  let args;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError || err instanceof RangeError) {
      console.error(`Error: ${err.message}\n`);
      printUsage();
      return ExitCode.Usage;
    }
    throw err;
  }

  if (args.help) {
    printUsage();
    return ExitCode.Success;
  }

  let result;
  try {
    result = runTagger(args.options);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    console.error(`Error: ${message}`);
    return ExitCode.Failure;
  }

  if (result.request) {
    console.log(`✓ Tagged ${result.request.destination}`);
  } else {
    console.log(`✗ No usable record in ${args.options.logfile}`);
  }
  if (result.skippedLines > 0) {
    console.log(`  Skipped ${result.skippedLines} unparseable line(s)`);
  }

  return ExitCode.Success;
}
