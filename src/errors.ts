/**
 * Fatal input problem (missing file, unknown source group). Raised before any
 * output is written; the CLI exits with `exitCode`.
 */
export class ConversionInputError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "ConversionInputError";
    this.exitCode = exitCode;
  }
}
