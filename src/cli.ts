import { Command } from "commander";
import chalk from "chalk";
import { convertCsvFile, convertWorkbookFile, ConversionInputError, type FileConversion } from "./index.js";
import { HAS_REALTIME_DATA, SOURCES_DIR } from "./config.js";
import type { Clock } from "./types.js";
import { log } from "./logger.js";

/**
 * Command line interface.
 *
 * Usage:
 *   parking-geojson csv <file>
 *   parking-geojson xlsx <source_uid> <source_group> [--sources-dir <dir>] [--no-realtime-data]
 *
 * Exit status is non-zero only for usage errors and missing input files;
 * rejected rows are counted in the summary line.
 */

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface ProgramOptions {
  io?: CliIO;
  now?: Clock;
  exitOverride?: boolean;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function summaryLine(label: string, features: number, errors: number): string {
  return `Successful with ${features} ${label} and ${errors} Errors`;
}

export function createProgram(programOptions: ProgramOptions = {}): Command {
  const io = programOptions.io ?? consoleIO;
  const program = new Command();
  program.configureOutput({
    writeOut: (str) => io.out(str.trimEnd()),
    writeErr: (str) => io.err(str.trimEnd()),
  });
  if (programOptions.exitOverride) program.exitOverride();

  program
    .name("parking-geojson")
    .description("Convert parking reference tables (CSV, XLSX) to GeoJSON feature collections");

  const fail = (err: unknown): never => {
    if (err instanceof ConversionInputError) {
      program.error(chalk.red(err.message), { exitCode: err.exitCode });
    }
    throw err;
  };

  const report = (conversion: FileConversion) => {
    for (const d of conversion.headerDiagnostics) log.cli("warning: %s", d.message);
    for (const drop of conversion.drops) io.out(drop.reason);
    for (const e of conversion.errors) io.out(e.message);
  };

  program
    .command("csv")
    .description("Convert a CSV file with uid, lat and lon columns")
    .argument("<file>", "path to the CSV file")
    .action((file: string) => {
      let conversion: FileConversion;
      try {
        conversion = convertCsvFile(file, { now: programOptions.now });
      } catch (err) {
        return fail(err);
      }
      report(conversion);
      const rejected = conversion.drops.length + conversion.errors.length;
      io.out(summaryLine("features", conversion.collection.features.length, rejected));
    });

  program
    .command("xlsx")
    .description("Convert sources/<source_group>/<source_uid>.xlsx")
    .argument("<source_uid>", "source identifier, the workbook's file name")
    .argument("<source_group>", "parking-sites or parking-spots")
    .option("--sources-dir <dir>", "directory holding the source groups", SOURCES_DIR)
    .option("--no-realtime-data", "mark records as having no realtime data")
    .action((sourceUid: string, sourceGroup: string, opts: { sourcesDir: string; realtimeData: boolean }) => {
      let conversion: FileConversion;
      try {
        conversion = convertWorkbookFile(sourceUid, sourceGroup, {
          sourcesDir: opts.sourcesDir,
          hasRealtimeData: opts.realtimeData && HAS_REALTIME_DATA,
          now: programOptions.now,
        });
      } catch (err) {
        return fail(err);
      }
      report(conversion);
      io.out(summaryLine(sourceGroup, conversion.collection.features.length, conversion.errors.length));
    });

  return program;
}
