/** The input file name matches none of the known export dialects. */
export class UnknownFormatError extends Error {
  constructor(readonly filePath: string) {
    super(`Unrecognized input format: ${filePath}`);
    this.name = "UnknownFormatError";
  }
}

/** A data row of a recognized dialect could not be converted. */
export class RowParseError extends Error {
  constructor(
    readonly file: string | undefined,
    readonly line: number,
    readonly reason: string
  ) {
    super(`${file ?? "<input>"}:${line}: ${reason}`);
    this.name = "RowParseError";
  }
}
